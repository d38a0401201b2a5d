import { errorMessage } from '../errors.js'
import type { Database } from '../storage/database.js'
import type { PromptMetrics } from '../prompt/builder.js'

export type InteractionStatus = 'answered' | 'failed'

export interface ModelParams {
  model: string
  temperature: number
  maxTokens: number
  presencePenalty: number
  frequencyPenalty: number
}

export interface InteractionTimings {
  retrievalMs: number
  modelMs: number
  totalMs: number
}

export interface SourceMeta {
  topic: string
  score: number
  rank: number
}

export interface InteractionLog {
  id: number
  userId: string
  sessionId: string
  status: InteractionStatus
  userMessage: string
  answer: string | null
  error: string | null
  /** The assembled system prompt sent with the message. */
  systemPrompt: string
  summaryText: string | null
  historyCount: number
  sources: SourceMeta[]
  modelParams: ModelParams
  promptMetrics: PromptMetrics
  timings: InteractionTimings
  configVersion: number
  createdAt: Date
}

export type NewInteractionLog = Omit<InteractionLog, 'id' | 'createdAt'>

export const DEFAULT_LOG_LIMIT = 20

/**
 * Per-turn record of what was sent to the model and how it went. A write
 * that fails is reported and dropped; it never fails the turn it describes.
 */
export class InteractionLogStore {
  private db: Database

  constructor(db: Database) {
    this.db = db
  }

  record(entry: NewInteractionLog): InteractionLog | null {
    const createdAt = new Date()
    try {
      const id = this.db.insertInteractionLog({ ...entry, createdAt })
      return { ...entry, id, createdAt }
    } catch (e) {
      console.error(`[interactions] Could not log turn on ${entry.sessionId}:`, errorMessage(e, 'unknown error'))
      return null
    }
  }

  /** Newest first. */
  list(userId: string, limit: number = DEFAULT_LOG_LIMIT): InteractionLog[] {
    return this.db.getInteractionLogs({ userId, limit })
  }
}
