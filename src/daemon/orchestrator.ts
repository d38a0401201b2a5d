import { z } from 'zod'
import {
  IdentityMismatchError,
  InvalidRequestError,
  ModelCallError,
  RetrievalError,
  SessionClosedError,
  errorMessage
} from '../errors.js'
import { buildPrompt } from '../prompt/builder.js'
import { withTimeout } from '../utils/timeout.js'
import type { MemoryLifecycleManager } from '../consolidation/manager.js'
import type { InteractionLogStore, ModelParams, NewInteractionLog } from '../logging/interaction-log.js'
import type { SessionMemoryStore } from '../memory/session-store.js'
import type { PersistentSummaryStore } from '../memory/summary-store.js'
import type { KnowledgeRetrieval, RetrievedChunk } from '../providers/retrieval.js'
import type { LanguageModelClient } from '../providers/llm.js'
import type { RuntimeConfigStore } from '../settings/runtime-config.js'

export const turnRequestSchema = z.object({
  userId: z.string().min(1),
  username: z.string().min(1),
  fullName: z.string().nullable().optional(),
  sessionId: z.string().min(1),
  traitScores: z.record(z.string(), z.number()).default({}),
  message: z.string().refine(m => m.trim().length > 0, 'message must not be empty')
})

export type TurnRequest = z.input<typeof turnRequestSchema>

export interface SourceRef {
  text: string
  metadata: { topic: string; score: number; rank: number }
}

export interface TurnResult {
  answer: string
  sources: SourceRef[]
  plan: Record<string, unknown>
  critique: string
  followup: string
}

export interface TurnTimeouts {
  retrievalMs: number
  modelMs: number
}

export class ChatOrchestrator {
  private runtimeConfig: RuntimeConfigStore
  private sessions: SessionMemoryStore
  private summaries: PersistentSummaryStore
  private lifecycle: MemoryLifecycleManager
  private retrieval: KnowledgeRetrieval
  private model: LanguageModelClient
  private timeouts: TurnTimeouts
  private interactions: InteractionLogStore

  constructor(params: {
    runtimeConfig: RuntimeConfigStore
    sessions: SessionMemoryStore
    summaries: PersistentSummaryStore
    lifecycle: MemoryLifecycleManager
    retrieval: KnowledgeRetrieval
    model: LanguageModelClient
    timeouts: TurnTimeouts
    interactions: InteractionLogStore
  }) {
    this.runtimeConfig = params.runtimeConfig
    this.sessions = params.sessions
    this.summaries = params.summaries
    this.lifecycle = params.lifecycle
    this.retrieval = params.retrieval
    this.model = params.model
    this.timeouts = params.timeouts
    this.interactions = params.interactions
  }

  /**
   * Runs one conversational turn. Either resolves with a complete answer
   * whose exchange pair is stored, or rejects with a typed error and leaves
   * the session as it was.
   */
  async handleTurn(input: unknown): Promise<TurnResult> {
    const parsed = turnRequestSchema.safeParse(input)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      throw new InvalidRequestError(`Invalid turn request: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'malformed'}`)
    }
    const request = parsed.data
    const receivedAt = new Date()
    const started = Date.now()

    // One snapshot for the whole turn
    const { config, version } = this.runtimeConfig.snapshot()

    const session = this.sessions.getSession(request.sessionId)
    if (session) {
      if (session.userId !== request.userId) {
        throw new IdentityMismatchError(`Session ${request.sessionId} does not belong to user ${request.userId}`)
      }
      if (session.status === 'terminated') {
        throw new SessionClosedError(`Session ${request.sessionId} has expired`)
      }

      const outcome = await this.lifecycle.compactIfNeeded(request.sessionId)
      if (outcome.status === 'failed') {
        console.warn(`[turn] Continuing ${request.sessionId} with unreduced history: ${outcome.error.message}`)
      }
    }

    const history = this.sessions.get(request.sessionId)
    const summary = this.summaries.get(request.userId)
    const retrievalStarted = Date.now()
    const chunks = await this.retrieve(request.message, config.topKRagHits)
    const retrievalMs = Date.now() - retrievalStarted

    const built = buildPrompt({
      config,
      user: { username: request.username, fullName: request.fullName },
      traits: request.traitScores,
      summary,
      history,
      chunks
    })

    const modelParams: ModelParams = {
      model: config.model.name,
      temperature: config.model.temperature,
      maxTokens: config.model.maxTokens,
      presencePenalty: config.model.presencePenalty,
      frequencyPenalty: config.model.frequencyPenalty
    }
    const logEntry = (modelMs: number): Omit<NewInteractionLog, 'status' | 'answer' | 'error'> => ({
      userId: request.userId,
      sessionId: request.sessionId,
      userMessage: request.message,
      systemPrompt: built.prompt,
      summaryText: summary.kind === 'summary' ? summary.summaryText : null,
      historyCount: built.includedHistory.length,
      sources: built.sources.map(chunk => ({ topic: chunk.topic, score: chunk.score, rank: chunk.rank })),
      modelParams,
      promptMetrics: built.metrics,
      timings: { retrievalMs, modelMs, totalMs: Date.now() - started },
      configVersion: version
    })

    const modelStarted = Date.now()
    let answer: string
    try {
      answer = await this.callModel({ system: built.prompt, prompt: request.message, ...modelParams })
    } catch (e) {
      this.interactions.record({
        ...logEntry(Date.now() - modelStarted),
        status: 'failed',
        answer: null,
        error: errorMessage(e, 'model call failed')
      })
      throw e
    }
    const modelMs = Date.now() - modelStarted

    await this.sessions.append(request.sessionId, request.userId, [
      { role: 'user', content: request.message, timestamp: receivedAt },
      { role: 'assistant', content: answer }
    ])

    this.interactions.record({ ...logEntry(modelMs), status: 'answered', answer, error: null })

    console.log(
      `[turn] ${request.sessionId} answered in ${Date.now() - started}ms ` +
      `(config v${version}, style ${built.style}, history ${built.includedHistory.length}, sources ${built.sources.length}, prompt ${built.metrics.total} chars)`
    )

    return {
      answer,
      sources: built.sources.map(chunk => ({
        text: chunk.text,
        metadata: { topic: chunk.topic, score: chunk.score, rank: chunk.rank }
      })),
      plan: {},
      critique: '',
      followup: ''
    }
  }

  private async retrieve(query: string, topK: number): Promise<RetrievedChunk[]> {
    if (topK <= 0) return []
    try {
      const chunks = await withTimeout(
        signal => this.retrieval.search(query, topK, signal),
        this.timeouts.retrievalMs,
        () => new RetrievalError(`Knowledge retrieval timed out after ${this.timeouts.retrievalMs}ms`, { timedOut: true })
      )
      return chunks.slice(0, topK)
    } catch (e) {
      console.warn(`[retrieval] Continuing without reference material: ${errorMessage(e, 'retrieval failed')}`)
      return []
    }
  }

  private async callModel(request: Parameters<LanguageModelClient['complete']>[0]): Promise<string> {
    let text: string
    try {
      const response = await withTimeout(
        signal => this.model.complete(request, signal),
        this.timeouts.modelMs,
        () => new ModelCallError(`Model call timed out after ${this.timeouts.modelMs}ms`, { timedOut: true })
      )
      text = response.text
    } catch (e) {
      if (e instanceof ModelCallError) throw e
      throw new ModelCallError(`Model call failed: ${errorMessage(e, 'unknown error')}`, { cause: e })
    }

    if (!text.trim()) {
      throw new ModelCallError('Model returned an empty answer')
    }
    return text
  }
}
