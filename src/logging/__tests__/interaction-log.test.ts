import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { Database } from '../../storage/database.js'
import { InteractionLogStore, type NewInteractionLog } from '../interaction-log.js'

const entry: NewInteractionLog = {
  userId: 'u-1',
  sessionId: 's-1',
  status: 'answered',
  userMessage: 'How do I start?',
  answer: 'Pick one small task.',
  error: null,
  systemPrompt: 'You are a guide.',
  summaryText: 'Likes mornings.',
  historyCount: 2,
  sources: [],
  modelParams: { model: 'gpt-4o-mini', temperature: 0.7, maxTokens: 800, presencePenalty: 0, frequencyPenalty: 0 },
  promptMetrics: { base: 16, traits: 0, summary: 15, history: 40, reference: 0, total: 73, droppedHistory: 0, droppedChunks: 0 },
  timings: { retrievalMs: 0, modelMs: 12, totalMs: 15 },
  configVersion: 3
}

describe('InteractionLogStore', () => {
  let db: Database
  let store: InteractionLogStore

  beforeEach(() => {
    db = new Database(':memory:')
    store = new InteractionLogStore(db)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('records a turn and lists it back', () => {
    const logged = store.record(entry)

    expect(logged).toMatchObject({ id: 1, ...entry })
    expect(store.list('u-1')).toEqual([logged])
    db.close()
  })

  it('reports a failed write instead of throwing', () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {})
    db.close()

    expect(store.record(entry)).toBeNull()
    expect(errors).toHaveBeenCalledWith('[interactions] Could not log turn on s-1:', expect.any(String))
  })
})
