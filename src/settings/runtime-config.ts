import { z } from 'zod'
import { ConcurrencyConflict, ConfigurationError } from '../errors.js'
import { PROMPT_STYLES } from '../prompt/styles.js'
import { DEFAULT_SYSTEM_PROMPT } from '../prompt/base-prompt.js'
import type { Database } from '../storage/database.js'

export const runtimeConfigSchema = z.object({
  systemPromptTemplate: z.string().min(1),
  promptStyle: z.enum(PROMPT_STYLES),
  customStyleModifier: z.string().nullable(),
  conversationHistoryLimit: z.number().int().min(0),
  topKRagHits: z.number().int().min(0),
  maxPromptChars: z.number().int().positive(),
  model: z.object({
    name: z.string().min(1),
    temperature: z.number().min(0).max(2),
    maxTokens: z.number().int().positive(),
    presencePenalty: z.number().min(-2).max(2),
    frequencyPenalty: z.number().min(-2).max(2)
  }).strict()
}).strict()

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  systemPromptTemplate: DEFAULT_SYSTEM_PROMPT,
  promptStyle: 'default',
  customStyleModifier: null,
  conversationHistoryLimit: 5,
  topKRagHits: 5,
  maxPromptChars: 20_000,
  model: {
    name: 'gpt-4o-mini',
    temperature: 0.7,
    maxTokens: 1000,
    presencePenalty: 0.1,
    frequencyPenalty: 0.1
  }
}

export interface RuntimeConfigSnapshot {
  readonly version: number
  readonly updatedAt: Date
  readonly updatedBy: string | null
  readonly config: Readonly<RuntimeConfig> & { readonly model: Readonly<RuntimeConfig['model']> }
}

function freeze(config: RuntimeConfig): RuntimeConfigSnapshot['config'] {
  const copy = structuredClone(config)
  Object.freeze(copy.model)
  return Object.freeze(copy)
}

export function parseRuntimeConfig(input: unknown): RuntimeConfig {
  const parsed = runtimeConfigSchema.safeParse(input)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(`Invalid runtime config: ${details}`)
  }
  return parsed.data
}

/**
 * The single, process-wide generation settings record. Reads hand out a
 * frozen snapshot; writes replace the whole record and bump its version.
 */
export class RuntimeConfigStore {
  private db: Database
  private current: RuntimeConfigSnapshot

  constructor(db: Database) {
    this.db = db
    this.current = this.load()
  }

  snapshot(): RuntimeConfigSnapshot {
    return this.current
  }

  replace(input: unknown, options: { updatedBy?: string; expectedVersion?: number } = {}): RuntimeConfigSnapshot {
    const config = parseRuntimeConfig(input)

    if (options.expectedVersion !== undefined && options.expectedVersion !== this.current.version) {
      throw new ConcurrencyConflict(
        `Runtime config is at version ${this.current.version}, expected ${options.expectedVersion}`
      )
    }

    if (config.promptStyle === 'custom' && !config.customStyleModifier?.trim()) {
      console.warn('[config] promptStyle "custom" saved without customStyleModifier; turns will use the default style')
    }

    return this.write(config, options.updatedBy ?? null)
  }

  resetToDefaults(updatedBy?: string): RuntimeConfigSnapshot {
    return this.write(DEFAULT_RUNTIME_CONFIG, updatedBy ?? null)
  }

  private write(config: RuntimeConfig, updatedBy: string | null): RuntimeConfigSnapshot {
    const next: RuntimeConfigSnapshot = {
      version: this.current.version + 1,
      updatedAt: new Date(),
      updatedBy,
      config: freeze(config)
    }
    this.db.saveRuntimeConfig({ ...next, config })
    this.current = next
    console.log(`[config] Runtime config now at version ${next.version}${updatedBy ? ` (by ${updatedBy})` : ''}`)
    return next
  }

  private load(): RuntimeConfigSnapshot {
    const stored = this.db.loadRuntimeConfig()

    if (stored) {
      try {
        return {
          version: stored.version,
          updatedAt: stored.updatedAt,
          updatedBy: stored.updatedBy,
          config: freeze(parseRuntimeConfig(stored.config))
        }
      } catch (e) {
        // A record the current schema rejects is replaced rather than served
        console.error('[config] Stored runtime config is invalid, restoring defaults:', e)
        const restored: RuntimeConfigSnapshot = {
          version: stored.version + 1,
          updatedAt: new Date(),
          updatedBy: 'system',
          config: freeze(DEFAULT_RUNTIME_CONFIG)
        }
        this.db.saveRuntimeConfig({ ...restored, config: DEFAULT_RUNTIME_CONFIG })
        return restored
      }
    }

    const seeded: RuntimeConfigSnapshot = {
      version: 1,
      updatedAt: new Date(),
      updatedBy: 'system',
      config: freeze(DEFAULT_RUNTIME_CONFIG)
    }
    this.db.saveRuntimeConfig({ ...seeded, config: DEFAULT_RUNTIME_CONFIG })
    return seeded
  }
}
