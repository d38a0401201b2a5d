import { describe, it, expect, vi, beforeEach } from 'vitest'
import { AiSdkLanguageModel, createCondenser, createLLMProvider, type LanguageModelClient, type ModelRequest } from '../llm.js'
import { buildCondensationPrompt } from '../../consolidation/prompts.js'
import { DEFAULT_CONFIG } from '../../config.js'
import { ModelCallError } from '../../errors.js'
import type { Exchange } from '../../memory/types.js'

const generateText = vi.hoisted(() => vi.fn())

vi.mock('ai', () => ({ generateText }))

const request: ModelRequest = {
  system: 'You are a guide.',
  prompt: 'How do I start?',
  model: 'gpt-4o-mini',
  temperature: 0.7,
  maxTokens: 1000,
  presencePenalty: 0.1,
  frequencyPenalty: 0.1
}

const transcript: Exchange[] = [
  { seq: 1, role: 'user', content: 'I keep putting things off', timestamp: new Date('2026-02-01T10:00:00Z') },
  { seq: 2, role: 'assistant', content: 'What is the first small step?', timestamp: new Date('2026-02-01T10:00:05Z') }
]

describe('createLLMProvider', () => {
  it.each(['openai', 'ollama', 'openrouter', 'cerebras'] as const)('builds chat models for %s', provider => {
    const models = createLLMProvider({ ...DEFAULT_CONFIG.llm, provider, baseUrl: undefined, apiKey: 'test-secret' })
    expect(models('some-model').modelId).toBe('some-model')
  })

  it('does not need a key for ollama', () => {
    const models = createLLMProvider({ ...DEFAULT_CONFIG.llm, provider: 'ollama', apiKey: undefined })
    expect(models('llama3').modelId).toBe('llama3')
  })
})

describe('AiSdkLanguageModel', () => {
  beforeEach(() => {
    generateText.mockReset()
  })

  it('passes generation settings through and returns the text', async () => {
    generateText.mockResolvedValue({ text: 'Start with five minutes.' })
    const client = new AiSdkLanguageModel(createLLMProvider({ ...DEFAULT_CONFIG.llm, apiKey: 'test-secret' }))

    const response = await client.complete(request)

    expect(response).toEqual({ text: 'Start with five minutes.' })
    expect(generateText).toHaveBeenCalledWith(expect.objectContaining({
      system: 'You are a guide.',
      prompt: 'How do I start?',
      temperature: 0.7,
      maxOutputTokens: 1000,
      presencePenalty: 0.1,
      frequencyPenalty: 0.1,
      maxRetries: 1
    }))
  })

  it('wraps provider failures in ModelCallError', async () => {
    generateText.mockRejectedValue(new Error('503'))
    const client = new AiSdkLanguageModel(createLLMProvider({ ...DEFAULT_CONFIG.llm, apiKey: 'test-secret' }))

    const err = await client.complete(request).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ModelCallError)
    expect(err instanceof ModelCallError && err.message).toBe('Model call to gpt-4o-mini failed')
    expect(err instanceof ModelCallError && err.timedOut).toBe(false)
  })
})

describe('createCondenser', () => {
  it('asks the model for a low-temperature summary and trims it', async () => {
    const seen: ModelRequest[] = []
    const client: LanguageModelClient = {
      async complete(req) {
        seen.push(req)
        return { text: '  Struggles with procrastination.  \n' }
      }
    }

    const condense = createCondenser(client, 'gpt-4o-mini')
    const text = await condense(transcript, 'Works as a nurse.', new AbortController().signal)

    expect(text).toBe('Struggles with procrastination.')
    expect(seen[0]).toMatchObject({ model: 'gpt-4o-mini', temperature: 0.3, maxTokens: 600 })
    expect(seen[0].prompt).toBe(buildCondensationPrompt(transcript, 'Works as a nurse.'))
  })
})

describe('buildCondensationPrompt', () => {
  it('carries the transcript and any earlier background', () => {
    const prompt = buildCondensationPrompt(transcript, 'Works as a nurse.')
    expect(prompt).toContain('Conversation:\nUser: I keep putting things off\nAssistant: What is the first small step?\n')
    expect(prompt).toContain('What is already known about this user from earlier sessions:\nWorks as a nurse.\n')
  })

  it('leaves out the background section on a first summary', () => {
    expect(buildCondensationPrompt(transcript, null)).not.toContain('earlier sessions')
  })
})
