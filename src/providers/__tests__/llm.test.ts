import { describe, it, expect } from 'vitest'
import { createCompletionFn, createLLMProvider, resolveBaseUrl } from '../llm.js'
import { createVoyageEmbedder } from '../embeddings.js'
import { DEFAULT_CONFIG, mergeConfig } from '../../config.js'

describe('LLM Provider', () => {
  it('creates an OpenAI-compatible chat model for openai', () => {
    const model = createLLMProvider({ ...DEFAULT_CONFIG.llm, apiKey: 'test-key' })('gpt-4o-mini')
    expect(model.modelId).toBe('gpt-4o-mini')
    expect(model.provider).toBe('openai.chat')
  })

  it('names the provider after the configured backend', () => {
    const cerebras = createLLMProvider({ ...DEFAULT_CONFIG.llm, provider: 'cerebras', apiKey: 'test-key' })
    const ollama = createLLMProvider({ ...DEFAULT_CONFIG.llm, provider: 'ollama', baseUrl: 'http://localhost:11434/v1' })
    const openrouter = createLLMProvider({ ...DEFAULT_CONFIG.llm, provider: 'openrouter', apiKey: 'test-key' })

    expect(cerebras('llama3.1-8b').provider).toBe('cerebras.chat')
    expect(ollama('llama3.2').provider).toBe('ollama.chat')
    expect(openrouter('openai/gpt-4o-mini').provider).toBe('openrouter.chat')
  })

  it('sends each provider to its own endpoint unless a base URL is configured', () => {
    const forProvider = (llm: object) => mergeConfig(structuredClone(DEFAULT_CONFIG), { llm }).llm

    expect(resolveBaseUrl(forProvider({ provider: 'ollama' }))).toBe('http://localhost:11434/v1')
    expect(resolveBaseUrl(forProvider({ provider: 'cerebras' }))).toBe('https://api.cerebras.ai/v1')
    expect(resolveBaseUrl(forProvider({ provider: 'openrouter' }))).toBe('https://openrouter.ai/api/v1')
    expect(resolveBaseUrl(DEFAULT_CONFIG.llm)).toBe('https://api.openai.com/v1')
    expect(resolveBaseUrl(forProvider({ provider: 'ollama', baseUrl: 'http://gpu-box:11434/v1' }))).toBe('http://gpu-box:11434/v1')
  })

  it('throws for anthropic provider (not yet implemented)', () => {
    expect(() => createLLMProvider({
      ...DEFAULT_CONFIG.llm,
      provider: 'anthropic',
      apiKey: 'test-key'
    })).toThrow('Anthropic provider not yet implemented')
  })

  it('builds a completion function without calling the model', () => {
    const complete = createCompletionFn({ ...DEFAULT_CONFIG.llm, apiKey: 'test-key' }, 'gpt-4o-mini')
    expect(typeof complete).toBe('function')
  })
})

describe('Embeddings', () => {
  it('skips the request for an empty batch', async () => {
    await expect(createVoyageEmbedder().embedMany([])).resolves.toEqual([])
  })

  it.skipIf(!process.env.VOYAGE_API_KEY)('generates an embedding via Voyage', async () => {
    const result = await createVoyageEmbedder().embed('hello world')
    expect(result.length).toBeGreaterThan(0)
    expect(typeof result[0]).toBe('number')
  })
})
