import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { Database } from '../../storage/database.js'
import { PersistentSummaryStore } from '../summary-store.js'
import { SessionMemoryStore } from '../session-store.js'
import type { Exchange } from '../types.js'

const at = new Date('2026-04-01T12:00:00Z')

const transcript: Exchange[] = [
  { seq: 1, role: 'user', content: 'I moved to Lisbon', timestamp: at },
  { seq: 2, role: 'assistant', content: 'How is it going?', timestamp: at }
]

describe('PersistentSummaryStore', () => {
  let db: Database
  let store: PersistentSummaryStore

  beforeEach(() => {
    db = new Database(':memory:')
    store = new PersistentSummaryStore(db)
  })

  afterEach(() => {
    db.close()
  })

  it('returns the empty sentinel for a user with no summary', () => {
    expect(store.get('u-1')).toEqual({ kind: 'empty', userId: 'u-1' })
  })

  it('writes the summary and exactly one event', async () => {
    const event = await store.replace('u-1', 'Lives in Lisbon', transcript, { sessionId: 's-1', triggerReason: 'expire' })

    expect(event).toMatchObject({
      userId: 'u-1',
      sessionId: 's-1',
      triggerReason: 'expire',
      exchangeCount: 2,
      charsBefore: 33,
      summaryLength: 15
    })

    const summary = store.get('u-1')
    expect(summary.kind).toBe('summary')
    if (summary.kind === 'summary') {
      expect(summary.summaryText).toBe('Lives in Lisbon')
      expect(summary.eventId).toBe(event.id)
      expect(summary.transcriptSnapshot).toEqual(transcript)
    }
    expect(store.events('u-1')).toHaveLength(1)
  })

  it('measures text in the same characters as session size', async () => {
    const sessions = new SessionMemoryStore(db)
    const stored = await sessions.append('s-1', 'u-1', [
      { role: 'user', content: 'tea 🍵' },
      { role: 'assistant', content: 'ok 👍' }
    ])

    const event = await store.replace('u-1', 'likes 🍵', stored, { sessionId: 's-1', triggerReason: 'expire' })

    expect(sessions.sizeOf('s-1').charCount).toBe(9)
    expect(event.charsBefore).toBe(9)
    expect(event.summaryLength).toBe(7)
  })

  it('overwrites the previous summary', async () => {
    await store.replace('u-1', 'first', transcript, { sessionId: 's-1', triggerReason: 'expire' })
    await store.replace('u-1', 'second', transcript, { sessionId: 's-2', triggerReason: 'size_threshold' })

    const summary = store.get('u-1')
    expect(summary.kind === 'summary' && summary.summaryText).toBe('second')
    expect(store.events('u-1').map(e => e.sessionId)).toEqual(['s-2', 's-1'])
  })

  it('applies neither summary nor event when the transaction callback fails', async () => {
    await expect(store.replace('u-1', 'doomed', transcript, { sessionId: 's-1', triggerReason: 'expire' }, () => {
      throw new Error('commit failed')
    })).rejects.toThrow('commit failed')

    expect(store.get('u-1')).toEqual({ kind: 'empty', userId: 'u-1' })
    expect(store.events('u-1')).toEqual([])
  })

  it('serializes concurrent replaces for one user', async () => {
    await Promise.all([
      store.replace('u-1', 'one', transcript, { sessionId: 's-1', triggerReason: 'expire' }),
      store.replace('u-1', 'two', transcript, { sessionId: 's-2', triggerReason: 'expire' }),
      store.replace('u-1', 'three', transcript, { sessionId: 's-3', triggerReason: 'expire' })
    ])

    const summary = store.get('u-1')
    expect(summary.kind === 'summary' && summary.summaryText).toBe('three')
    expect(store.events('u-1')).toHaveLength(3)
  })

  it('clears the summary but keeps the audit log', async () => {
    await store.replace('u-1', 'gone soon', transcript, { sessionId: 's-1', triggerReason: 'expire' })
    expect(await store.clear('u-1')).toBe(true)
    expect(store.get('u-1').kind).toBe('empty')
    expect(store.events('u-1')).toHaveLength(1)
  })
})
