import type { ConfigurationError } from '../errors.js'
import type { Exchange, StoredSummary, TraitProfile } from '../memory/types.js'
import type { RetrievedChunk } from '../providers/retrieval.js'
import type { RuntimeConfig } from '../settings/runtime-config.js'
import { renderTemplate, type PromptUser } from './base-prompt.js'
import { applyStyle, resolveStyle, type PromptStyle } from './styles.js'
import { buildTraitNarrative, groupTraits } from './traits.js'

export interface RankedChunk extends RetrievedChunk {
  /** 1-based position in the retrieval result. */
  rank: number
}

export interface PromptInput {
  config: Readonly<RuntimeConfig>
  user: PromptUser
  traits: TraitProfile
  summary: StoredSummary
  /** Full session history, oldest first. */
  history: Exchange[]
  /** Retrieval result, best match first. */
  chunks: RetrievedChunk[]
}

export interface PromptMetrics {
  base: number
  traits: number
  summary: number
  history: number
  reference: number
  total: number
  droppedHistory: number
  droppedChunks: number
}

export interface BuiltPrompt {
  prompt: string
  /** Chunks that made it into the prompt after truncation. */
  sources: RankedChunk[]
  includedHistory: Exchange[]
  style: PromptStyle
  styleError: ConfigurationError | null
  /** True when the untruncatable segments alone exceed maxPromptChars. */
  overBudget: boolean
  metrics: PromptMetrics
}

function traitSection(user: PromptUser, traits: TraitProfile): string | null {
  const narrative = buildTraitNarrative(traits)
  if (!narrative) return null
  const speaker = user.fullName || user.username
  return `USER PROFILE: ${speaker}\n${narrative}`
}

function summarySection(summary: StoredSummary): string | null {
  if (summary.kind === 'empty' || !summary.summaryText.trim()) return null
  return `USER BACKGROUND (from previous sessions):\n${summary.summaryText}`
}

function historySection(history: Exchange[]): string | null {
  if (history.length === 0) return null
  const lines = history.map(ex => `${ex.role === 'user' ? 'User' : 'Assistant'}: ${ex.content}`)
  return `RECENT CONVERSATION:\n${lines.join('\n')}`
}

function referenceSection(chunks: RankedChunk[]): string | null {
  if (chunks.length === 0) return null
  const lines = chunks.map(c => `[${c.rank}] (${c.topic}, ${c.score.toFixed(2)}) ${c.text}`)
  return `REFERENCE MATERIAL:\n${lines.join('\n\n')}`
}

function join(segments: (string | null)[]): string {
  return segments.filter((s): s is string => s !== null).join('\n\n')
}

export function buildPrompt(input: PromptInput): BuiltPrompt {
  const { config } = input

  const resolved = resolveStyle(config.promptStyle, config.customStyleModifier)
  if (resolved.error) {
    console.warn(`[prompt] ${resolved.error.message}; using default style`)
  }

  const rejected = groupTraits(input.traits).rejected
  if (rejected.length > 0) {
    console.warn(`[prompt] Ignoring trait scores outside 0-10: ${rejected.join(', ')}`)
  }

  const base = applyStyle(renderTemplate(config.systemPromptTemplate, input.user), resolved)
  const traits = traitSection(input.user, input.traits)
  const summary = summarySection(input.summary)

  const limit = Math.max(0, config.conversationHistoryLimit)
  let history = limit > 0 ? input.history.slice(-limit) : []
  let chunks: RankedChunk[] = input.chunks
    .slice(0, Math.max(0, config.topKRagHits))
    .map((chunk, i) => ({ ...chunk, rank: i + 1 }))

  const initialHistory = history.length
  const initialChunks = chunks.length
  const fixedLength = join([base, traits, summary]).length

  let prompt = join([base, traits, summary, historySection(history), referenceSection(chunks)])
  while (prompt.length > config.maxPromptChars) {
    if (history.length > 0) {
      history = history.slice(1)
    } else if (chunks.length > 0) {
      chunks = chunks.slice(0, -1)
    } else {
      break
    }
    prompt = join([base, traits, summary, historySection(history), referenceSection(chunks)])
  }

  const overBudget = fixedLength > config.maxPromptChars
  if (overBudget) {
    console.warn(`[prompt] Base prompt, traits and summary alone are ${fixedLength} chars (limit ${config.maxPromptChars})`)
  }

  return {
    prompt,
    sources: chunks,
    includedHistory: history,
    style: resolved.style,
    styleError: resolved.error,
    overBudget,
    metrics: {
      base: base.length,
      traits: traits?.length ?? 0,
      summary: summary?.length ?? 0,
      history: historySection(history)?.length ?? 0,
      reference: referenceSection(chunks)?.length ?? 0,
      total: prompt.length,
      droppedHistory: initialHistory - history.length,
      droppedChunks: initialChunks - chunks.length
    }
  }
}
