import { createOpenAI } from '@ai-sdk/openai'
import { generateText } from 'ai'
import { ModelCallError } from '../errors.js'
import { buildCondensationPrompt } from '../consolidation/prompts.js'
import type { CondenseFn } from '../consolidation/manager.js'
import type { AttuneConfig } from '../config.js'

const DEFAULT_BASE_URLS: Record<AttuneConfig['llm']['provider'], string> = {
  openai: 'https://api.openai.com/v1',
  ollama: 'http://localhost:11434/v1',
  openrouter: 'https://openrouter.ai/api/v1',
  cerebras: 'https://api.cerebras.ai/v1'
}

export type ModelFactory = ReturnType<typeof createLLMProvider>

export function createLLMProvider(config: AttuneConfig['llm']) {
  // OpenAI, Ollama, OpenRouter and Cerebras all speak the OpenAI chat format
  const openai = createOpenAI({
    apiKey: config.apiKey || (config.provider === 'ollama' ? 'ollama' : undefined),
    baseURL: config.baseUrl || DEFAULT_BASE_URLS[config.provider],
    name: config.provider
  })

  // chat() rather than the default Responses API, which only OpenAI serves
  return (modelId: string) => openai.chat(modelId)
}

export interface ModelRequest {
  system: string
  prompt: string
  model: string
  temperature: number
  maxTokens: number
  presencePenalty: number
  frequencyPenalty: number
}

export interface ModelResponse {
  text: string
}

export interface LanguageModelClient {
  complete(request: ModelRequest, signal?: AbortSignal): Promise<ModelResponse>
}

export class AiSdkLanguageModel implements LanguageModelClient {
  private models: ModelFactory

  constructor(models: ModelFactory) {
    this.models = models
  }

  async complete(request: ModelRequest, signal?: AbortSignal): Promise<ModelResponse> {
    try {
      const { text } = await generateText({
        model: this.models(request.model),
        system: request.system,
        prompt: request.prompt,
        temperature: request.temperature,
        maxOutputTokens: request.maxTokens,
        presencePenalty: request.presencePenalty,
        frequencyPenalty: request.frequencyPenalty,
        abortSignal: signal,
        maxRetries: 1
      })
      return { text }
    } catch (e) {
      if (e instanceof ModelCallError) throw e
      throw new ModelCallError(`Model call to ${request.model} failed`, { cause: e, timedOut: signal?.aborted ?? false })
    }
  }
}

/** Condenses a session through the language model, low temperature. */
export function createCondenser(client: LanguageModelClient, model: string): CondenseFn {
  return async (exchanges, priorSummary, signal) => {
    const { text } = await client.complete({
      system: 'You maintain concise long-term memory notes about a user for a personal guidance assistant.',
      prompt: buildCondensationPrompt(exchanges, priorSummary),
      model,
      temperature: 0.3,
      maxTokens: 600,
      presencePenalty: 0,
      frequencyPenalty: 0
    }, signal)
    return text.trim()
  }
}
