import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest'
import { Database } from '../../storage/database.js'
import { SessionMemoryStore } from '../../memory/session-store.js'
import { PersistentSummaryStore } from '../../memory/summary-store.js'
import { MemoryLifecycleManager, exceedsThreshold, type CondenseFn } from '../manager.js'
import { SessionClosedError, SummarizationError } from '../../errors.js'

function deferred<T>() {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>(r => { resolve = r })
  return { promise, resolve }
}

async function fill(sessions: SessionMemoryStore, sessionId: string, userId: string, contents: string[]): Promise<void> {
  for (const content of contents) {
    await sessions.append(sessionId, userId, [{ role: 'user', content }])
  }
}

describe('exceedsThreshold', () => {
  const thresholds = { maxMessages: 4, maxChars: 100 }

  it('does not trigger exactly at the limits', () => {
    expect(exceedsThreshold({ messageCount: 4, charCount: 100 }, thresholds)).toBe(false)
  })

  it('triggers one past either limit', () => {
    expect(exceedsThreshold({ messageCount: 5, charCount: 0 }, thresholds)).toBe(true)
    expect(exceedsThreshold({ messageCount: 1, charCount: 101 }, thresholds)).toBe(true)
  })
})

describe('MemoryLifecycleManager', () => {
  let db: Database
  let sessions: SessionMemoryStore
  let summaries: PersistentSummaryStore
  let condense: Mock<CondenseFn>

  function createManager(fn: CondenseFn, timeoutMs = 1_000): MemoryLifecycleManager {
    const manager = new MemoryLifecycleManager({
      sessions,
      summaries,
      condense: fn,
      thresholds: { maxMessages: 2, maxChars: 1_000 },
      timeoutMs
    })
    sessions.setLifecycle(manager)
    return manager
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    db = new Database(':memory:')
    sessions = new SessionMemoryStore(db, { appendBackoffMs: 1 })
    summaries = new PersistentSummaryStore(db)
    condense = vi.fn<CondenseFn>(async exchanges => `summary of ${exchanges.length}`)
  })

  afterEach(() => {
    vi.restoreAllMocks()
    db.close()
  })

  it('skips a session at the threshold and compacts one past it', async () => {
    const manager = createManager(condense)
    await fill(sessions, 's-1', 'u-1', ['a', 'b'])

    const below = await manager.compactIfNeeded('s-1')
    expect(below).toMatchObject({ status: 'skipped', skipped: 'below_threshold' })

    await fill(sessions, 's-1', 'u-1', ['c'])
    const outcome = await manager.compactIfNeeded('s-1')

    expect(outcome.status).toBe('compacted')
    expect(outcome.status === 'compacted' && outcome.removed).toBe(3)
    expect(sessions.get('s-1')).toEqual([])
    expect(sessions.getSession('s-1')?.status).toBe('active')
    const summary = summaries.get('u-1')
    expect(summary.kind === 'summary' && summary.summaryText).toBe('summary of 3')
  })

  it('writes one summary and one event for a doubled expire', async () => {
    const manager = createManager(condense)
    await fill(sessions, 's-1', 'u-1', ['a', 'b'])

    const [first, second] = await Promise.all([sessions.expire('s-1'), sessions.expire('s-1')])

    expect(first.status).toBe('compacted')
    expect(second).toMatchObject({ status: 'skipped', skipped: 'terminated' })
    expect(condense).toHaveBeenCalledTimes(1)
    expect(summaries.events('u-1')).toHaveLength(1)
    expect(manager.state('s-1')).toBe('terminated')
  })

  it('keeps session memory when condensation fails', async () => {
    const manager = createManager(async () => { throw new Error('model down') })
    await fill(sessions, 's-1', 'u-1', ['a', 'b'])

    const outcome = await manager.compact('s-1', 'expire', { terminal: true })

    expect(outcome.status).toBe('failed')
    if (outcome.status === 'failed') {
      expect(outcome.error).toBeInstanceOf(SummarizationError)
      expect(outcome.error.message).toBe('Compaction failed: model down')
    }
    expect(sessions.get('s-1').map(e => e.content)).toEqual(['a', 'b'])
    expect(summaries.get('u-1').kind).toBe('empty')
    expect(manager.state('s-1')).toBe('active')
  })

  it('treats an empty summary as a failure', async () => {
    const manager = createManager(async () => '   ')
    await fill(sessions, 's-1', 'u-1', ['a'])

    const outcome = await manager.compact('s-1', 'expire', { terminal: true })

    expect(outcome.status === 'failed' && outcome.error.message).toBe('Condensation returned an empty summary')
    expect(sessions.get('s-1')).toHaveLength(1)
  })

  it('gives up on a condensation that outlives the timeout', async () => {
    const stuck: CondenseFn = (_exchanges, _prior, signal) =>
      new Promise((_, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted')))
      })
    const manager = createManager(stuck, 20)
    await fill(sessions, 's-1', 'u-1', ['a', 'b'])

    const outcome = await manager.compact('s-1', 'expire', { terminal: true })

    expect(outcome.status).toBe('failed')
    if (outcome.status === 'failed') {
      expect(outcome.error.timedOut).toBe(true)
      expect(outcome.error.message).toBe('Condensation timed out after 20ms')
    }
    expect(sessions.get('s-1')).toHaveLength(2)
    expect(sessions.getSession('s-1')?.status).toBe('active')
  })

  it('keeps exchanges appended while summarizing', async () => {
    const gate = deferred<string>()
    const started = deferred<void>()
    const manager = createManager(async () => {
      started.resolve()
      return gate.promise
    })
    await fill(sessions, 's-1', 'u-1', ['a', 'b', 'c'])

    const compaction = manager.compactIfNeeded('s-1')
    await started.promise
    expect(manager.state('s-1')).toBe('summarizing')

    await sessions.append('s-1', 'u-1', [{ role: 'user', content: 'late' }])
    gate.resolve('condensed')
    const outcome = await compaction

    expect(outcome.status === 'compacted' && outcome.removed).toBe(3)
    expect(sessions.get('s-1')).toEqual([
      expect.objectContaining({ seq: 4, content: 'late' })
    ])
    expect(manager.state('s-1')).toBe('active')
  })

  it('refuses appends while an expire is summarizing', async () => {
    const gate = deferred<string>()
    const started = deferred<void>()
    const manager = createManager(async () => {
      started.resolve()
      return gate.promise
    })
    await fill(sessions, 's-1', 'u-1', ['a', 'b'])

    const expiry = sessions.expire('s-1')
    await started.promise

    await expect(sessions.append('s-1', 'u-1', [
      { role: 'user', content: 'late' },
      { role: 'assistant', content: 'late-answer' }
    ])).rejects.toThrow(SessionClosedError)
    gate.resolve('condensed')
    const outcome = await expiry

    expect(outcome.status === 'compacted' && outcome.removed).toBe(2)
    expect(sessions.get('s-1')).toEqual([])
    expect(manager.state('s-1')).toBe('terminated')
    expect(await sessions.expire('s-1')).toMatchObject({ status: 'skipped', skipped: 'terminated' })
  })

  it('summarizes an append queued ahead of the expire', async () => {
    createManager(condense)
    await fill(sessions, 's-1', 'u-1', ['a', 'b'])

    const [, outcome] = await Promise.all([
      sessions.append('s-1', 'u-1', [{ role: 'user', content: 'c' }]),
      sessions.expire('s-1')
    ])

    expect(outcome.status === 'compacted' && outcome.removed).toBe(3)
    expect(condense.mock.calls[0][0].map(e => e.content)).toEqual(['a', 'b', 'c'])
    expect(sessions.get('s-1')).toEqual([])
  })

  it('accepts appends again after a failed expire', async () => {
    createManager(async () => { throw new Error('model down') })
    await fill(sessions, 's-1', 'u-1', ['a'])

    expect((await sessions.expire('s-1')).status).toBe('failed')
    await fill(sessions, 's-1', 'u-1', ['b'])

    expect(sessions.get('s-1').map(e => e.content)).toEqual(['a', 'b'])
  })

  it('builds each summary of a user on the one committed before it', async () => {
    const join = vi.fn<CondenseFn>(async (exchanges, prior) => {
      const text = exchanges.map(e => e.content).join(' ')
      return prior ? `${prior} + ${text}` : text
    })
    createManager(join)
    await fill(sessions, 's-1', 'u-1', ['a1', 'b1'])
    await fill(sessions, 's-2', 'u-1', ['a2', 'b2'])

    const outcomes = await Promise.all([sessions.expire('s-1'), sessions.expire('s-2')])

    expect(outcomes.map(o => o.status)).toEqual(['compacted', 'compacted'])
    expect(join.mock.calls.map(call => call[1])).toEqual([null, 'a1 b1'])
    const summary = summaries.get('u-1')
    expect(summary.kind === 'summary' && summary.summaryText).toBe('a1 b1 + a2 b2')
    expect(summaries.events('u-1')).toHaveLength(2)
  })

  it('passes the previous summary into the next condensation', async () => {
    createManager(condense)
    await fill(sessions, 's-1', 'u-1', ['a'])
    await sessions.expire('s-1')

    await fill(sessions, 's-2', 'u-1', ['b'])
    await sessions.expire('s-2')

    expect(condense).toHaveBeenCalledTimes(2)
    expect(condense.mock.calls[0][1]).toBeNull()
    expect(condense.mock.calls[1][1]).toBe('summary of 1')
  })

  it('closes an empty session without writing a summary', async () => {
    const manager = createManager(condense)
    await sessions.init('s-1', 'u-1')

    const outcome = await sessions.expire('s-1')

    expect(outcome).toMatchObject({ status: 'skipped', skipped: 'empty' })
    expect(condense).not.toHaveBeenCalled()
    expect(summaries.events('u-1')).toEqual([])
    expect(manager.state('s-1')).toBe('terminated')
  })

  it('skips an unknown session', async () => {
    createManager(condense)
    expect(await sessions.expire('ghost')).toMatchObject({ status: 'skipped', skipped: 'unknown_session' })
  })

  it('expires idle sessions and leaves terminated ones alone', async () => {
    const manager = createManager(condense)
    await fill(sessions, 's-1', 'u-1', ['a'])
    await fill(sessions, 's-2', 'u-2', ['b'])
    await fill(sessions, 's-3', 'u-3', ['c'])
    await sessions.expire('s-3')

    const outcomes = await manager.expireIdle(new Date(Date.now() + 60_000))

    expect(outcomes.map(o => [o.sessionId, o.status, o.reason]).sort()).toEqual([
      ['s-1', 'compacted', 'idle_expiry'],
      ['s-2', 'compacted', 'idle_expiry']
    ])
    expect(sessions.countActive()).toBe(0)
  })

  it('leaves recently active sessions out of an idle sweep', async () => {
    const manager = createManager(condense)
    await fill(sessions, 's-1', 'u-1', ['a'])

    expect(await manager.expireIdle(new Date(Date.now() - 60_000))).toEqual([])
    expect(sessions.countActive()).toBe(1)
  })
})
