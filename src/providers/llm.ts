import { createOpenAI } from '@ai-sdk/openai'
import { generateText } from 'ai'
import type { KeepsakeConfig } from '../config.js'

export interface CompletionOptions {
  system?: string
  maxOutputTokens?: number
}

/** Prompt in, raw model text out. Extraction and classification depend on this, not on a provider. */
export type CompletionFn = (prompt: string, options?: CompletionOptions) => Promise<string>

const DEFAULT_BASE_URLS: Record<KeepsakeConfig['llm']['provider'], string> = {
  openai: 'https://api.openai.com/v1',
  cerebras: 'https://api.cerebras.ai/v1',
  ollama: 'http://localhost:11434/v1',
  openrouter: 'https://openrouter.ai/api/v1',
  anthropic: ''
}

/** An explicit `baseUrl` wins; otherwise the endpoint the provider is known to serve on. */
export function resolveBaseUrl(config: KeepsakeConfig['llm']): string {
  return config.baseUrl || DEFAULT_BASE_URLS[config.provider]
}

export function createLLMProvider(config: KeepsakeConfig['llm']) {
  // Cerebras, OpenAI, Ollama, OpenRouter all use OpenAI-compatible format
  if (config.provider === 'anthropic') {
    throw new Error('Anthropic provider not yet implemented; install @ai-sdk/anthropic when needed')
  }

  const openai = createOpenAI({
    apiKey: config.apiKey || process.env.OPENAI_API_KEY || process.env.CEREBRAS_API_KEY,
    baseURL: resolveBaseUrl(config),
    name: config.provider
  })

  // chat() rather than the default Responses API, which only OpenAI supports
  return (modelId: string) => openai.chat(modelId)
}

export function createCompletionFn(config: KeepsakeConfig['llm'], modelId: string): CompletionFn {
  const model = createLLMProvider(config)(modelId)

  return async (prompt, options = {}) => {
    const { text } = await generateText({
      model,
      system: options.system,
      prompt,
      maxOutputTokens: options.maxOutputTokens ?? 2048,
      abortSignal: AbortSignal.timeout(config.timeoutMs)
    })
    return text
  }
}
