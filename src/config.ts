import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs'
import { homedir } from 'node:os'
import path from 'node:path'
import { z } from 'zod'
import { ConfigurationError } from './errors.js'

const configSchema = z.object({
  llm: z.object({
    provider: z.enum(['openai', 'ollama', 'openrouter', 'cerebras']),
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional(),
    summaryModel: z.string().min(1),
    requestTimeoutMs: z.number().int().positive(),
    summaryTimeoutMs: z.number().int().positive()
  }),
  retrieval: z.object({
    enabled: z.boolean(),
    baseUrl: z.string().url().optional(),
    timeoutMs: z.number().int().positive(),
    minScore: z.number().min(0)
  }),
  memory: z.object({
    sessionMessageLimit: z.number().int().positive(),
    sessionCharLimit: z.number().int().positive(),
    sessionIdleMinutes: z.number().positive(),
    expiryCheckIntervalMinutes: z.number().positive(),
    appendRetries: z.number().int().min(1),
    appendBackoffMs: z.number().int().min(0)
  }),
  storage: z.object({
    dbPath: z.string().min(1)
  })
})

export type AttuneConfig = z.infer<typeof configSchema>

export const DEFAULT_CONFIG: AttuneConfig = {
  llm: {
    provider: 'openai',
    baseUrl: 'https://api.openai.com/v1',
    summaryModel: 'gpt-4o-mini',
    requestTimeoutMs: 60_000,
    summaryTimeoutMs: 45_000
  },
  retrieval: {
    enabled: false,
    timeoutMs: 5_000,
    minScore: 0
  },
  memory: {
    sessionMessageLimit: 40,
    sessionCharLimit: 24_000,
    sessionIdleMinutes: 30,
    expiryCheckIntervalMinutes: 5,
    appendRetries: 3,
    appendBackoffMs: 25
  },
  storage: {
    dbPath: '~/.attune/memory.db'
  }
}

export const CONFIG_DIR = path.join(homedir(), '.attune')

export function getConfigPath(): string {
  return process.env.ATTUNE_CONFIG || path.join(CONFIG_DIR, 'config.json')
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target }
  for (const key of Object.keys(source)) {
    const value = source[key]
    if (isRecord(value)) {
      const base = target[key]
      result[key] = deepMerge(isRecord(base) ? base : {}, value)
    } else if (value !== undefined) {
      result[key] = value
    }
  }
  return result
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) return {}
  try {
    const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'))
    if (isRecord(parsed)) return parsed
    console.error(`[config] ${configPath} does not contain a JSON object, ignoring it`)
  } catch (e) {
    console.error('[config] Failed to load config:', e)
  }
  return {}
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: { llm: Record<string, unknown>; retrieval: Record<string, unknown> } = { llm: {}, retrieval: {} }
  const apiKey = env.ATTUNE_API_KEY || env.OPENAI_API_KEY
  if (apiKey) overrides.llm.apiKey = apiKey
  if (env.ATTUNE_RETRIEVAL_URL) {
    overrides.retrieval.baseUrl = env.ATTUNE_RETRIEVAL_URL
    overrides.retrieval.enabled = true
  }
  return overrides
}

export function parseConfig(input: unknown): AttuneConfig {
  const parsed = configSchema.safeParse(input)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(`Invalid config: ${details}`)
  }
  return parsed.data
}

export function loadConfig(configPath: string = getConfigPath(), env: NodeJS.ProcessEnv = process.env): AttuneConfig {
  const fileConfig = readConfigFile(configPath)
  // An API key in the file wins over the environment
  const withEnv = deepMerge(envOverrides(env), fileConfig)
  return parseConfig(deepMerge(DEFAULT_CONFIG, withEnv))
}

/** Problems that would stop the daemon from serving turns. */
export function validateConfig(config: AttuneConfig, options: { requireApiKey?: boolean } = {}): ConfigurationError[] {
  const problems: ConfigurationError[] = []
  const requireApiKey = options.requireApiKey ?? true
  if (requireApiKey && !config.llm.apiKey && config.llm.provider !== 'ollama') {
    problems.push(new ConfigurationError(`No API key for provider "${config.llm.provider}". Set OPENAI_API_KEY or ATTUNE_API_KEY, or run: attune config set llm.apiKey <key>`))
  }
  if (config.retrieval.enabled && !config.retrieval.baseUrl) {
    problems.push(new ConfigurationError('Retrieval is enabled but retrieval.baseUrl is not set'))
  }
  return problems
}

export function expandHome(p: string): string {
  return p.startsWith('~') ? path.join(homedir(), p.slice(1)) : p
}

export function saveConfig(patch: Record<string, unknown>, configPath: string = getConfigPath()): void {
  mkdirSync(path.dirname(configPath), { recursive: true })
  const merged = deepMerge(readConfigFile(configPath), patch)
  // Reject a patch that would leave the file unloadable
  parseConfig(deepMerge(DEFAULT_CONFIG, merged))
  writeFileSync(configPath, JSON.stringify(merged, null, 2))
}

/** Turns `a.b.c` and a value into `{ a: { b: { c: value } } }`. */
export function patchFromPath(dotted: string, value: unknown): Record<string, unknown> {
  const keys = dotted.split('.').filter(Boolean)
  if (keys.length === 0) {
    throw new ConfigurationError('Config key must not be empty')
  }
  let patch: Record<string, unknown> = { [keys[keys.length - 1]]: value }
  for (let i = keys.length - 2; i >= 0; i--) {
    patch = { [keys[i]]: patch }
  }
  return patch
}
