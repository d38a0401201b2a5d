import { z } from 'zod'
import { RetrievalError } from '../errors.js'
import type { AttuneConfig } from '../config.js'

export interface RetrievedChunk {
  text: string
  topic: string
  score: number
}

export interface KnowledgeRetrieval {
  /** Best match first, at most `topK` entries. */
  search(query: string, topK: number, signal?: AbortSignal): Promise<RetrievedChunk[]>
}

const chunkSchema = z.object({
  text: z.string(),
  topic: z.string().default('general'),
  score: z.number()
})

// The search service answers either with a bare array or `{ results: [...] }`
const searchResponseSchema = z.union([
  z.array(chunkSchema),
  z.object({ results: z.array(chunkSchema) }).transform(body => body.results)
])

export class HttpKnowledgeRetrieval implements KnowledgeRetrieval {
  private baseUrl: string
  private minScore: number

  constructor(params: { baseUrl: string; minScore?: number }) {
    this.baseUrl = params.baseUrl.replace(/\/+$/, '')
    this.minScore = params.minScore ?? 0
  }

  async search(query: string, topK: number, signal?: AbortSignal): Promise<RetrievedChunk[]> {
    if (topK <= 0) return []

    let response: Response
    try {
      response = await fetch(`${this.baseUrl}/search`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ query, top_k: topK }),
        signal
      })
    } catch (e) {
      throw new RetrievalError('Knowledge retrieval request failed', { cause: e, timedOut: signal?.aborted ?? false })
    }

    if (!response.ok) {
      throw new RetrievalError(`Knowledge retrieval returned ${response.status} ${response.statusText}`)
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (e) {
      throw new RetrievalError('Knowledge retrieval returned invalid JSON', { cause: e })
    }

    const parsed = searchResponseSchema.safeParse(body)
    if (!parsed.success) {
      throw new RetrievalError(`Unexpected knowledge retrieval response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`)
    }

    return parsed.data
      .filter(chunk => chunk.score >= this.minScore)
      .sort((a, b) => b.score - a.score)
      .slice(0, topK)
  }
}

/** Used when no retrieval service is configured. */
export class NullKnowledgeRetrieval implements KnowledgeRetrieval {
  async search(): Promise<RetrievedChunk[]> {
    return []
  }
}

export function createKnowledgeRetrieval(config: AttuneConfig['retrieval']): KnowledgeRetrieval {
  if (!config.enabled || !config.baseUrl) {
    return new NullKnowledgeRetrieval()
  }
  return new HttpKnowledgeRetrieval({ baseUrl: config.baseUrl, minScore: config.minScore })
}
