import { SummarizationError, errorMessage } from '../errors.js'
import { KeyedMutex } from '../utils/keyed-mutex.js'
import { charLength } from '../utils/text.js'
import { withTimeout } from '../utils/timeout.js'
import type { SessionMemoryStore } from '../memory/session-store.js'
import type { PersistentSummaryStore } from '../memory/summary-store.js'
import type { Exchange, SessionSize, SummarizationEvent, TriggerReason } from '../memory/types.js'

export type LifecycleState = 'active' | 'summarizing' | 'summarized' | 'terminated'

const TRANSITIONS: Record<LifecycleState, readonly LifecycleState[]> = {
  active: ['summarizing', 'terminated'],
  summarizing: ['summarized', 'active'],
  summarized: ['active', 'terminated'],
  terminated: []
}

/**
 * Turns a transcript (plus the user's previous summary, if any) into one
 * summary text. Implementations should stop work when `signal` aborts.
 */
export type CondenseFn = (exchanges: Exchange[], priorSummary: string | null, signal: AbortSignal) => Promise<string>

export interface SizeThresholds {
  maxMessages: number
  maxChars: number
}

export type SkipReason = 'below_threshold' | 'empty' | 'terminated' | 'unknown_session'

export type CompactionOutcome =
  | { status: 'compacted'; sessionId: string; reason: TriggerReason; event: SummarizationEvent; removed: number }
  | { status: 'skipped'; sessionId: string; reason: TriggerReason; skipped: SkipReason }
  | { status: 'failed'; sessionId: string; reason: TriggerReason; error: SummarizationError }

export function exceedsThreshold(size: SessionSize, thresholds: SizeThresholds): boolean {
  return size.messageCount > thresholds.maxMessages || size.charCount > thresholds.maxChars
}

export class MemoryLifecycleManager {
  private sessions: SessionMemoryStore
  private summaries: PersistentSummaryStore
  private condense: CondenseFn
  private thresholds: SizeThresholds
  private timeoutMs: number
  private locks: KeyedMutex = new KeyedMutex()
  private userLocks: KeyedMutex = new KeyedMutex()
  /** Sessions mid-compaction. Everything else is active or terminated per the store. */
  private states: Map<string, LifecycleState> = new Map()

  constructor(params: {
    sessions: SessionMemoryStore
    summaries: PersistentSummaryStore
    condense: CondenseFn
    thresholds: SizeThresholds
    timeoutMs: number
  }) {
    this.sessions = params.sessions
    this.summaries = params.summaries
    this.condense = params.condense
    this.thresholds = params.thresholds
    this.timeoutMs = params.timeoutMs
  }

  state(sessionId: string): LifecycleState | null {
    const transient = this.states.get(sessionId)
    if (transient) return transient
    const session = this.sessions.getSession(sessionId)
    if (!session) return null
    return session.status === 'terminated' ? 'terminated' : 'active'
  }

  exceedsThreshold(sessionId: string): boolean {
    return exceedsThreshold(this.sessions.sizeOf(sessionId), this.thresholds)
  }

  async compactIfNeeded(sessionId: string): Promise<CompactionOutcome> {
    if (!this.exceedsThreshold(sessionId)) {
      return { status: 'skipped', sessionId, reason: 'size_threshold', skipped: 'below_threshold' }
    }
    return this.compact(sessionId, 'size_threshold', { terminal: false })
  }

  /**
   * One compaction per session at a time. A caller that queued behind
   * another re-checks the session once it gets the lock, so a repeated
   * trigger finds nothing left to do. Compactions of one user's sessions
   * run one after another, each condensing from the summary the previous
   * one committed. A terminal compaction refuses appends until it is done.
   */
  async compact(sessionId: string, reason: TriggerReason, options: { terminal: boolean }): Promise<CompactionOutcome> {
    return this.locks.runExclusive(sessionId, () => this.runCompaction(sessionId, reason, options.terminal))
  }

  /** Expires every active session untouched since `before`. */
  async expireIdle(before: Date): Promise<CompactionOutcome[]> {
    const idle = this.sessions.listIdle(before)
    const outcomes: CompactionOutcome[] = []
    for (const session of idle) {
      outcomes.push(await this.compact(session.sessionId, 'idle_expiry', { terminal: true }))
    }
    return outcomes
  }

  private async runCompaction(sessionId: string, reason: TriggerReason, terminal: boolean): Promise<CompactionOutcome> {
    const session = this.sessions.getSession(sessionId)
    if (!session) {
      return { status: 'skipped', sessionId, reason, skipped: 'unknown_session' }
    }
    if (session.status === 'terminated') {
      return { status: 'skipped', sessionId, reason, skipped: 'terminated' }
    }
    if (!terminal && !this.exceedsThreshold(sessionId)) {
      return { status: 'skipped', sessionId, reason, skipped: 'below_threshold' }
    }

    // A closing session takes no new exchanges, so the snapshot is everything
    if (terminal) {
      await this.sessions.holdAppends(sessionId)
    }
    try {
      // Prior summary read, condense and commit form one step per user
      return await this.userLocks.runExclusive(session.userId, () =>
        this.condenseAndCommit(sessionId, session.userId, reason, terminal)
      )
    } finally {
      if (terminal) {
        this.sessions.releaseAppends(sessionId)
      }
    }
  }

  private async condenseAndCommit(sessionId: string, userId: string, reason: TriggerReason, terminal: boolean): Promise<CompactionOutcome> {
    const exchanges = this.sessions.get(sessionId)
    if (exchanges.length === 0) {
      if (terminal) {
        this.transition(sessionId, 'terminated')
        this.sessions.terminate(sessionId)
        console.log(`[lifecycle] Session ${sessionId} closed with nothing to summarize`)
      }
      return { status: 'skipped', sessionId, reason, skipped: 'empty' }
    }

    this.transition(sessionId, 'summarizing')
    const through = exchanges[exchanges.length - 1].seq
    const prior = this.summaries.get(userId)
    const started = Date.now()

    try {
      const summaryText = await withTimeout(
        signal => this.condense(exchanges, prior.kind === 'summary' ? prior.summaryText : null, signal),
        this.timeoutMs,
        () => new SummarizationError(`Condensation timed out after ${this.timeoutMs}ms`, { timedOut: true })
      )
      if (!summaryText.trim()) {
        throw new SummarizationError('Condensation returned an empty summary')
      }

      let removed = 0
      const event = await this.summaries.replace(
        userId,
        summaryText,
        exchanges,
        { sessionId, triggerReason: reason },
        () => {
          removed = this.sessions.clearThrough(sessionId, through, terminal)
        }
      )

      this.transition(sessionId, 'summarized')
      this.transition(sessionId, terminal ? 'terminated' : 'active')
      console.log(`[lifecycle] Compacted ${exchanges.length} exchanges of ${sessionId} (${reason}) into ${charLength(summaryText)} chars in ${Date.now() - started}ms`)
      return { status: 'compacted', sessionId, reason, event, removed }
    } catch (e) {
      this.transition(sessionId, 'active')
      const error = e instanceof SummarizationError
        ? e
        : new SummarizationError(`Compaction failed: ${errorMessage(e, 'unknown error')}`, { cause: e })
      console.error(`[lifecycle] Compaction of ${sessionId} failed, memory kept:`, error.message)
      return { status: 'failed', sessionId, reason, error }
    }
  }

  private transition(sessionId: string, to: LifecycleState): void {
    const from = this.states.get(sessionId) ?? 'active'
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Illegal lifecycle transition for ${sessionId}: ${from} -> ${to}`)
    }
    if (to === 'active' || to === 'terminated') {
      this.states.delete(sessionId)
    } else {
      this.states.set(sessionId, to)
    }
  }
}
