import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs'
import { homedir } from 'node:os'
import path from 'node:path'
import { createLogger } from './logger.js'

const log = createLogger('config')

export interface ScoringWeights {
  similarity: number
  importance: number
  recency: number
  accessFrequency: number
  confidence: number
}

export interface KeepsakeConfig {
  llm: {
    provider: 'cerebras' | 'openai' | 'anthropic' | 'ollama' | 'openrouter'
    extractionModel: string
    classificationModel: string
    embeddingModel: string
    apiKey?: string
    baseUrl?: string
    timeoutMs: number
  }
  memory: {
    decayHalfLifeDays: number
    /** Cosine similarity at or above which a candidate counts as a duplicate. */
    duplicateThreshold: number
    dedupNeighborCount: number
    dedupSameTypeOnly: boolean
    minConfidence: number
    groundingTurns: number
  }
  retrieval: {
    weights: ScoringWeights
    candidatePoolSize: number
    topK: number
    tokenBudget: number
    accessFrequencyScale: number
    greetingTurnWindow: number
  }
  index: {
    maxAttempts: number
    retry: {
      attempts: number
      baseDelayMs: number
      maxDelayMs: number
    }
  }
  cache: {
    ttlSeconds: number
    maxEntries: number
  }
  worker: {
    concurrency: number
    capacity: number
    taskTimeoutMs: number
  }
  reconciliation: {
    intervalMinutes: number
    batchSize: number
  }
  storage: {
    dbPath: string
  }
}

export const DEFAULT_CONFIG: KeepsakeConfig = {
  llm: {
    provider: 'openai',
    extractionModel: 'gpt-4o-mini',
    classificationModel: 'gpt-4o-mini',
    embeddingModel: 'voyage-3',
    timeoutMs: 30000
  },
  memory: {
    decayHalfLifeDays: 90,
    duplicateThreshold: 0.95,
    dedupNeighborCount: 50,
    dedupSameTypeOnly: false,
    minConfidence: 0.5,
    groundingTurns: 3
  },
  retrieval: {
    weights: {
      similarity: 0.35,
      importance: 0.25,
      recency: 0.2,
      accessFrequency: 0.15,
      confidence: 0.05
    },
    candidatePoolSize: 50,
    topK: 15,
    tokenBudget: 2000,
    accessFrequencyScale: 5,
    greetingTurnWindow: 2
  },
  index: {
    maxAttempts: 5,
    retry: {
      attempts: 3,
      baseDelayMs: 100,
      maxDelayMs: 2000
    }
  },
  cache: {
    ttlSeconds: 3600,
    maxEntries: 1000
  },
  worker: {
    concurrency: 2,
    capacity: 500,
    taskTimeoutMs: 60000
  },
  reconciliation: {
    intervalMinutes: 10,
    batchSize: 100
  },
  storage: {
    dbPath: '~/.keepsake/memory.db'
  }
}

const CONFIG_DIR = path.join(homedir(), '.keepsake')
const CONFIG_PATH = path.join(CONFIG_DIR, 'config.json')

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Recursively overlays `source` onto `target`. Keys in `source` whose value
 * type does not match the default's are ignored, so a hand-edited config file
 * cannot replace a number with a string.
 */
export function mergeConfig<T>(target: T, source: unknown): T {
  if (!isRecord(target) || !isRecord(source)) return target
  const result: Record<string, unknown> = { ...target }
  for (const key of Object.keys(source)) {
    const incoming = source[key]
    const current = result[key]
    if (isRecord(current)) {
      result[key] = mergeConfig(current, incoming)
    } else if (current === undefined || typeof current === typeof incoming) {
      result[key] = incoming
    } else {
      log.warn(`ignoring "${key}": expected ${typeof current}, got ${typeof incoming}`)
    }
  }
  return Object.assign(structuredClone(target), result)
}

function readConfigFile(): unknown {
  if (!existsSync(CONFIG_PATH)) return {}
  try {
    return JSON.parse(readFileSync(CONFIG_PATH, 'utf-8'))
  } catch (e) {
    log.error('Failed to load config:', e)
    return {}
  }
}

export function loadConfig(overrides: unknown = {}): KeepsakeConfig {
  const merged = mergeConfig(mergeConfig(structuredClone(DEFAULT_CONFIG), readConfigFile()), overrides)

  if (process.env.KEEPSAKE_DB_PATH) {
    merged.storage.dbPath = process.env.KEEPSAKE_DB_PATH
  }
  if (!merged.llm.apiKey) {
    merged.llm.apiKey = merged.llm.provider === 'cerebras'
      ? process.env.CEREBRAS_API_KEY
      : process.env.OPENAI_API_KEY
  }

  return merged
}

export function saveConfig(config: unknown): void {
  mkdirSync(CONFIG_DIR, { recursive: true })
  const existing = readConfigFile()
  const next = isRecord(existing) ? mergeConfig(existing, config) : config
  writeFileSync(CONFIG_PATH, JSON.stringify(next, null, 2))
}

export function resolveDbPath(config: KeepsakeConfig): string {
  const raw = config.storage.dbPath
  return raw.startsWith('~') ? path.join(homedir(), raw.slice(1)) : raw
}

export interface ConfigError {
  field: string
  message: string
}

function inUnitRange(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1
}

export function validateConfig(config: KeepsakeConfig, options: { requireApiKeys?: boolean } = {}): ConfigError[] {
  const errors: ConfigError[] = []

  if (options.requireApiKeys ?? true) {
    const needsKey = config.llm.provider !== 'ollama'
    if (needsKey && !config.llm.apiKey) {
      errors.push({ field: 'llm.apiKey', message: `No API key for provider "${config.llm.provider}" (set OPENAI_API_KEY or CEREBRAS_API_KEY)` })
    }
    if (!process.env.VOYAGE_API_KEY) {
      errors.push({ field: 'VOYAGE_API_KEY', message: 'VOYAGE_API_KEY is required for embeddings' })
    }
  }

  const weights = config.retrieval.weights
  const values = Object.values(weights)
  if (values.some(w => !inUnitRange(w))) {
    errors.push({ field: 'retrieval.weights', message: 'every weight must be within [0, 1]' })
  }
  const sum = values.reduce((acc, w) => acc + w, 0)
  if (Math.abs(sum - 1) > 1e-6) {
    errors.push({ field: 'retrieval.weights', message: `weights must sum to 1.0 (got ${sum.toFixed(4)})` })
  }

  if (!inUnitRange(config.memory.duplicateThreshold)) {
    errors.push({ field: 'memory.duplicateThreshold', message: 'must be within [0, 1]' })
  }
  if (!inUnitRange(config.memory.minConfidence)) {
    errors.push({ field: 'memory.minConfidence', message: 'must be within [0, 1]' })
  }
  if (!(config.memory.decayHalfLifeDays > 0)) {
    errors.push({ field: 'memory.decayHalfLifeDays', message: 'must be positive' })
  }
  if (!(config.retrieval.accessFrequencyScale > 0)) {
    errors.push({ field: 'retrieval.accessFrequencyScale', message: 'must be positive' })
  }
  if (config.retrieval.topK < 1 || config.retrieval.candidatePoolSize < config.retrieval.topK) {
    errors.push({ field: 'retrieval.topK', message: 'topK must be >= 1 and <= candidatePoolSize' })
  }
  if (config.index.maxAttempts < 1) {
    errors.push({ field: 'index.maxAttempts', message: 'must be >= 1' })
  }
  if (config.worker.concurrency < 1 || config.worker.capacity < 1) {
    errors.push({ field: 'worker', message: 'concurrency and capacity must be >= 1' })
  }

  return errors
}
