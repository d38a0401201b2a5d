export type ExchangeRole = 'user' | 'assistant'

export interface Exchange {
  seq: number
  role: ExchangeRole
  content: string
  timestamp: Date
}

/** An exchange as submitted by a caller, before the store assigns its sequence number. */
export interface NewExchange {
  role: ExchangeRole
  content: string
  timestamp?: Date
}

export type SessionStatus = 'active' | 'terminated'

export interface SessionRecord {
  sessionId: string
  userId: string
  status: SessionStatus
  createdAt: Date
  updatedAt: Date
}

export interface SessionMemory extends SessionRecord {
  exchanges: Exchange[]
}

export interface SessionSize {
  messageCount: number
  charCount: number
}

export type TriggerReason = 'size_threshold' | 'expire' | 'idle_expiry'

export interface SummarizationEvent {
  id: number
  userId: string
  sessionId: string
  triggerReason: TriggerReason
  exchangeCount: number
  charsBefore: number
  summaryLength: number
  createdAt: Date
}

export interface PersistentSummary {
  kind: 'summary'
  userId: string
  summaryText: string
  transcriptSnapshot: Exchange[]
  eventId: number
  createdAt: Date
}

export interface EmptySummary {
  kind: 'empty'
  userId: string
}

export type StoredSummary = PersistentSummary | EmptySummary

export type TraitProfile = Record<string, number>
