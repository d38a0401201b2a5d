import { ConcurrencyConflict, IdentityMismatchError, InvalidRequestError, SessionClosedError } from '../errors.js'
import { KeyedMutex } from '../utils/keyed-mutex.js'
import { retry } from '../utils/retry.js'
import type { Database } from '../storage/database.js'
import type { CompactionOutcome, MemoryLifecycleManager } from '../consolidation/manager.js'
import type { Exchange, NewExchange, SessionMemory, SessionRecord, SessionSize } from './types.js'

export interface SessionStoreOptions {
  appendRetries?: number
  appendBackoffMs?: number
}

/**
 * Short-term, per-conversation transcript. Each append is one transaction,
 * so a user/assistant pair is never visible half-written. Appends to the
 * same session queue behind each other; other sessions are unaffected.
 */
export class SessionMemoryStore {
  private db: Database
  private locks: KeyedMutex = new KeyedMutex()
  private lifecycle: MemoryLifecycleManager | null = null
  /** Sessions a terminal compaction is closing. */
  private held: Set<string> = new Set()
  private appendRetries: number
  private appendBackoffMs: number

  constructor(db: Database, options: SessionStoreOptions = {}) {
    this.db = db
    this.appendRetries = options.appendRetries ?? 3
    this.appendBackoffMs = options.appendBackoffMs ?? 25
  }

  setLifecycle(lifecycle: MemoryLifecycleManager): void {
    this.lifecycle = lifecycle
  }

  async init(sessionId: string, userId: string): Promise<SessionRecord> {
    return this.locks.runExclusive(sessionId, () => this.ensureSession(sessionId, userId, new Date()))
  }

  async append(sessionId: string, userId: string, exchanges: NewExchange[]): Promise<Exchange[]> {
    if (exchanges.length === 0) return []

    return this.locks.runExclusive(sessionId, () =>
      retry(() => Promise.resolve(this.writeExchanges(sessionId, userId, exchanges)), {
        maxAttempts: this.appendRetries,
        baseDelayMs: this.appendBackoffMs,
        shouldRetry: err => err instanceof ConcurrencyConflict,
        onRetry: (_err, attempt, delay) => {
          console.warn(`[session] append conflict on ${sessionId}, retry ${attempt} in ${Math.round(delay)}ms`)
        }
      })
    )
  }

  get(sessionId: string): Exchange[] {
    return this.db.getExchanges(sessionId)
  }

  getSession(sessionId: string): SessionRecord | null {
    return this.db.getSession(sessionId)
  }

  getMemory(sessionId: string): SessionMemory | null {
    const session = this.db.getSession(sessionId)
    if (!session) return null
    return { ...session, exchanges: this.db.getExchanges(sessionId) }
  }

  sizeOf(sessionId: string): SessionSize {
    return this.db.sessionSize(sessionId)
  }

  listIdle(before: Date): SessionRecord[] {
    return this.db.listSessions({ status: 'active', updatedBefore: before })
  }

  listForUser(userId: string): SessionRecord[] {
    return this.db.listSessions({ userId })
  }

  countActive(): number {
    return this.db.listSessions({ status: 'active' }).length
  }

  /**
   * Compacts the session into the owner's persistent summary and closes it.
   * Resolves after the summary is committed, or with a failed outcome and
   * the memory left in place.
   */
  async expire(sessionId: string): Promise<CompactionOutcome> {
    if (!this.lifecycle) {
      throw new Error('Session store has no lifecycle manager; call setLifecycle() first')
    }
    return this.lifecycle.compact(sessionId, 'expire', { terminal: true })
  }

  /**
   * Drops exchanges up to and including `seq`. Only called by compaction,
   * inside the summary transaction.
   */
  clearThrough(sessionId: string, seq: number, terminate: boolean): number {
    const removed = this.db.deleteExchangesThrough(sessionId, seq)
    const now = new Date()
    if (terminate) {
      this.db.terminateSession(sessionId, now)
    } else {
      this.db.touchSession(sessionId, now)
    }
    return removed
  }

  /**
   * Refuses further appends to the session with SessionClosedError.
   * Resolves once every append queued ahead of it has been written.
   */
  async holdAppends(sessionId: string): Promise<void> {
    await this.locks.runExclusive(sessionId, () => {
      this.held.add(sessionId)
    })
  }

  releaseAppends(sessionId: string): void {
    this.held.delete(sessionId)
  }

  /** Closes a session that has nothing to summarize. */
  terminate(sessionId: string): void {
    this.db.terminateSession(sessionId, new Date())
  }

  private writeExchanges(sessionId: string, userId: string, exchanges: NewExchange[]): Exchange[] {
    for (const ex of exchanges) {
      if (ex.role !== 'user' && ex.role !== 'assistant') {
        throw new InvalidRequestError(`Invalid exchange role: ${String(ex.role)}`)
      }
    }

    return this.db.transaction(() => {
      const now = new Date()
      this.ensureSession(sessionId, userId, now)

      let seq = this.db.maxSeq(sessionId)
      const stamped: Exchange[] = exchanges.map(ex => ({
        seq: ++seq,
        role: ex.role,
        content: ex.content,
        timestamp: ex.timestamp ?? now
      }))

      this.db.insertExchanges(sessionId, stamped)
      this.db.touchSession(sessionId, now)
      return stamped
    })
  }

  private ensureSession(sessionId: string, userId: string, now: Date): SessionRecord {
    const existing = this.db.getSession(sessionId)
    if (existing) {
      if (existing.userId !== userId) {
        throw new IdentityMismatchError(`Session ${sessionId} does not belong to user ${userId}`)
      }
      if (existing.status === 'terminated') {
        throw new SessionClosedError(`Session ${sessionId} has expired`)
      }
      if (this.held.has(sessionId)) {
        throw new SessionClosedError(`Session ${sessionId} is being closed`)
      }
      return existing
    }

    const created: SessionRecord = {
      sessionId,
      userId,
      status: 'active',
      createdAt: now,
      updatedAt: now
    }
    this.db.insertSession(created)
    return created
  }
}
