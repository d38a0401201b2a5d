import { homedir } from 'node:os'
import path from 'node:path'
import { mkdirSync } from 'node:fs'
import { z } from 'zod'
import type { ErrorCode } from '../errors.js'
import type { TurnResult } from './orchestrator.js'
import type { RuntimeConfig, RuntimeConfigSnapshot } from '../settings/runtime-config.js'
import type { CompactionOutcome, SkipReason } from '../consolidation/manager.js'
import type { SessionSize, SessionStatus, StoredSummary, SummarizationEvent, TriggerReason } from '../memory/types.js'
import type { InteractionLog } from '../logging/interaction-log.js'

const ATTUNE_DIR = path.join(homedir(), '.attune')

function ensureAttuneDir(): void {
  mkdirSync(ATTUNE_DIR, { recursive: true })
}

export function getSocketPath(): string {
  ensureAttuneDir()
  return path.join(ATTUNE_DIR, 'attune.sock')
}

export function getPidPath(): string {
  ensureAttuneDir()
  return path.join(ATTUNE_DIR, 'attune.pid')
}

// Payloads (`turn`, `config`) are validated by the component that owns them
export const daemonRequestSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('chat'), turn: z.unknown(), requestId: z.string().optional() }),
  z.object({ type: z.literal('status'), requestId: z.string().optional() }),
  z.object({ type: z.literal('config-get'), requestId: z.string().optional() }),
  z.object({
    type: z.literal('config-replace'),
    config: z.unknown(),
    updatedBy: z.string().optional(),
    expectedVersion: z.number().int().optional(),
    requestId: z.string().optional()
  }),
  z.object({ type: z.literal('config-reset'), updatedBy: z.string().optional(), requestId: z.string().optional() }),
  z.object({ type: z.literal('summary-get'), userId: z.string().min(1), requestId: z.string().optional() }),
  z.object({ type: z.literal('session-expire'), sessionId: z.string().min(1), requestId: z.string().optional() }),
  z.object({ type: z.literal('memory-stats'), userId: z.string().min(1), requestId: z.string().optional() }),
  z.object({
    type: z.literal('interaction-logs'),
    userId: z.string().min(1),
    limit: z.number().int().positive().max(500).optional(),
    requestId: z.string().optional()
  }),
  z.object({ type: z.literal('shutdown'), requestId: z.string().optional() })
])

export type DaemonRequest = z.infer<typeof daemonRequestSchema>

export type DaemonResponse =
  | { type: 'chat-result'; data: TurnResult; requestId?: string }
  | { type: 'status'; data: DaemonStatus; requestId?: string }
  | { type: 'expire-result'; data: CompactionOutcomeView; requestId?: string }
  | { type: 'config'; data: RuntimeConfigView; requestId?: string }
  | { type: 'summary'; data: SummaryView; requestId?: string }
  | { type: 'memory-stats'; data: MemoryStats; requestId?: string }
  | { type: 'interaction-logs'; data: InteractionLogView[]; requestId?: string }
  | { type: 'error'; code: ErrorCode | 'internal'; message: string; requestId?: string }
  | { type: 'ok'; data?: unknown; requestId?: string }

export interface DaemonStatus {
  uptime: number
  configVersion: number
  activeSessions: number
  lastIdleSweep: string | null
}

export interface RuntimeConfigView {
  version: number
  updatedAt: string
  updatedBy: string | null
  config: RuntimeConfig
}

export interface SummaryView {
  userId: string
  summaryText: string | null
  createdAt: string | null
  transcriptLength: number
}

/** CompactionOutcome flattened to JSON-safe fields. */
export interface CompactionOutcomeView {
  status: CompactionOutcome['status']
  sessionId: string
  reason: TriggerReason
  eventId?: number
  removed?: number
  skipped?: SkipReason
  error?: string
}

export interface SummaryEventView {
  id: number
  sessionId: string
  triggerReason: TriggerReason
  exchangeCount: number
  charsBefore: number
  summaryLength: number
  createdAt: string
}

export interface MemoryStats {
  userId: string
  summaryChars: number
  summaryUpdatedAt: string | null
  events: SummaryEventView[]
  sessions: { sessionId: string; status: SessionStatus; updatedAt: string; size: SessionSize }[]
}

export type InteractionLogView = Omit<InteractionLog, 'createdAt'> & { createdAt: string }

export function toOutcomeView(outcome: CompactionOutcome): CompactionOutcomeView {
  const base = { status: outcome.status, sessionId: outcome.sessionId, reason: outcome.reason }
  switch (outcome.status) {
    case 'compacted':
      return { ...base, eventId: outcome.event.id, removed: outcome.removed }
    case 'skipped':
      return { ...base, skipped: outcome.skipped }
    case 'failed':
      return { ...base, error: outcome.error.message }
  }
}

export function toEventView(event: SummarizationEvent): SummaryEventView {
  return {
    id: event.id,
    sessionId: event.sessionId,
    triggerReason: event.triggerReason,
    exchangeCount: event.exchangeCount,
    charsBefore: event.charsBefore,
    summaryLength: event.summaryLength,
    createdAt: event.createdAt.toISOString()
  }
}

export function toConfigView(snapshot: RuntimeConfigSnapshot): RuntimeConfigView {
  return {
    version: snapshot.version,
    updatedAt: snapshot.updatedAt.toISOString(),
    updatedBy: snapshot.updatedBy,
    config: structuredClone(snapshot.config)
  }
}

export function toSummaryView(summary: StoredSummary): SummaryView {
  if (summary.kind === 'empty') {
    return { userId: summary.userId, summaryText: null, createdAt: null, transcriptLength: 0 }
  }
  return {
    userId: summary.userId,
    summaryText: summary.summaryText,
    createdAt: summary.createdAt.toISOString(),
    transcriptLength: summary.transcriptSnapshot.length
  }
}

export function toInteractionLogView(log: InteractionLog): InteractionLogView {
  return { ...log, createdAt: log.createdAt.toISOString() }
}
