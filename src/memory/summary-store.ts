import { KeyedMutex } from '../utils/keyed-mutex.js'
import { charLength } from '../utils/text.js'
import type { Database } from '../storage/database.js'
import type { Exchange, StoredSummary, SummarizationEvent, TriggerReason } from './types.js'

export interface SummaryEventInput {
  sessionId: string
  triggerReason: TriggerReason
}

/**
 * Long-term, per-user memory. Each replace overwrites the prior summary and
 * records exactly one summarization event in the same transaction.
 */
export class PersistentSummaryStore {
  private db: Database
  private locks: KeyedMutex = new KeyedMutex()

  constructor(db: Database) {
    this.db = db
  }

  get(userId: string): StoredSummary {
    return this.db.getSummary(userId) ?? { kind: 'empty', userId }
  }

  /**
   * `withinTransaction` runs after both rows are written and before commit;
   * if it throws, neither the summary nor the event is applied.
   */
  async replace(
    userId: string,
    summaryText: string,
    transcriptSnapshot: Exchange[],
    event: SummaryEventInput,
    withinTransaction?: () => void
  ): Promise<SummarizationEvent> {
    return this.locks.runExclusive(userId, () =>
      this.db.transaction(() => {
        const createdAt = new Date()
        const record: Omit<SummarizationEvent, 'id'> = {
          userId,
          sessionId: event.sessionId,
          triggerReason: event.triggerReason,
          exchangeCount: transcriptSnapshot.length,
          charsBefore: transcriptSnapshot.reduce((sum, ex) => sum + charLength(ex.content), 0),
          summaryLength: charLength(summaryText),
          createdAt
        }

        const eventId = this.db.insertSummarizationEvent(record)
        this.db.upsertSummary({ userId, summaryText, transcriptSnapshot, eventId, createdAt })
        withinTransaction?.()

        return { ...record, id: eventId }
      })
    )
  }

  events(userId: string): SummarizationEvent[] {
    return this.db.getSummarizationEvents({ userId })
  }

  async clear(userId: string): Promise<boolean> {
    return this.locks.runExclusive(userId, () => this.db.deleteSummary(userId))
  }
}
