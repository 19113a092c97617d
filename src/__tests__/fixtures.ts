import { DEFAULT_CONFIG } from '../config.js'
import type { KeepsakeConfig } from '../config.js'
import { InMemoryVectorIndex } from '../storage/vector-index.js'
import type { IndexMatch, IndexMetadata, SimilarityIndex } from '../storage/vector-index.js'
import type { Embedder } from '../providers/embeddings.js'
import { contentHash, importanceScore } from '../memory/importance.js'
import type { Memory, MemoryBase, MemoryVariant } from '../memory/types.js'

/** Defaults with retries and timeouts shrunk for tests and an in-memory database. */
export function testConfig(): KeepsakeConfig {
  const config = structuredClone(DEFAULT_CONFIG)
  config.index.retry = { attempts: 1, baseDelayMs: 0, maxDelayMs: 0 }
  config.llm.timeoutMs = 1000
  config.storage.dbPath = ':memory:'
  return config
}

// Words that should land on the same axis, so related phrasing compares as similar.
const SYNONYMS: Record<string, string> = {
  colour: 'color',
  paint: 'color',
  wall: 'color',
  blue: 'color',
  green: 'color',
  works: 'work',
  working: 'work',
  job: 'work',
  employed: 'work'
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(w => w.length > 0)
    .map(w => SYNONYMS[w] ?? w)
}

/**
 * Bag-of-words embedder with a growing vocabulary. Texts sharing no words are
 * orthogonal; identical word sets are identical vectors.
 */
export class KeywordEmbedder implements Embedder {
  calls = 0
  private vocabulary = new Map<string, number>()

  vectorFor(text: string): number[] {
    const counts = new Map<number, number>()
    for (const word of tokenize(text)) {
      let dim = this.vocabulary.get(word)
      if (dim === undefined) {
        dim = this.vocabulary.size
        this.vocabulary.set(word, dim)
      }
      counts.set(dim, (counts.get(dim) ?? 0) + 1)
    }
    const vector = new Array<number>(this.vocabulary.size).fill(0)
    for (const [dim, count] of counts) vector[dim] = count
    return vector
  }

  async embed(text: string): Promise<number[]> {
    this.calls++
    return this.vectorFor(text)
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    this.calls++
    return texts.map(t => this.vectorFor(t))
  }
}

export class FailingEmbedder implements Embedder {
  async embed(): Promise<number[]> {
    throw new Error('embedder offline')
  }

  async embedMany(): Promise<number[][]> {
    throw new Error('embedder offline')
  }
}

/** Fails the first `failures` upserts (or every call when `failures` is Infinity), then delegates. */
export class FlakyIndex implements SimilarityIndex {
  readonly inner = new InMemoryVectorIndex()
  upserts = 0
  private failures: number

  constructor(failures: number) {
    this.failures = failures
  }

  heal(): void {
    this.failures = 0
  }

  async upsert(id: string, vector: number[], metadata: IndexMetadata): Promise<void> {
    this.upserts++
    if (this.failures > 0) {
      this.failures--
      throw new Error('index unreachable')
    }
    await this.inner.upsert(id, vector, metadata)
  }

  async query(vector: number[], filter: { userId: string }, topK: number): Promise<IndexMatch[]> {
    if (this.failures > 0) throw new Error('index unreachable')
    return this.inner.query(vector, filter, topK)
  }

  async delete(id: string): Promise<void> {
    if (this.failures > 0) throw new Error('index unreachable')
    await this.inner.delete(id)
  }
}

export class DownIndex implements SimilarityIndex {
  async upsert(): Promise<void> {
    throw new Error('index unreachable')
  }

  async query(): Promise<IndexMatch[]> {
    throw new Error('index unreachable')
  }

  async delete(): Promise<void> {
    throw new Error('index unreachable')
  }
}

export function manualClock(start: Date): { now: () => Date; advanceDays: (days: number) => void } {
  let current = start.getTime()
  return {
    now: () => new Date(current),
    advanceDays: (days) => {
      current += days * 24 * 60 * 60 * 1000
    }
  }
}

let counter = 0

export function makeMemory(overrides: Partial<MemoryBase> & { content: string; variant?: MemoryVariant }): Memory {
  counter++
  const { variant = { type: 'FACT' }, ...fields } = overrides
  const createdAt = fields.createdAt ?? new Date('2026-10-01T12:00:00Z')
  const importanceLevel = fields.importanceLevel ?? 'MEDIUM'
  const base: MemoryBase = {
    id: `mem-${counter}`,
    userId: 'user-1',
    content: fields.content,
    embedding: [1, 0],
    confidence: 0.9,
    importanceLevel,
    importanceScore: fields.importanceScore ?? importanceScore(importanceLevel),
    tags: [],
    entities: [],
    contentHash: contentHash(fields.content),
    sourceTurn: 1,
    conversationId: 'conv-1',
    createdAt,
    lastAccessed: createdAt,
    accessCount: 0,
    indexStatus: 'INDEXED',
    indexAttempts: 1,
    conflictCheck: 'NOT_APPLICABLE',
    supersededBy: null
  }
  return { ...base, ...fields, ...variant }
}

export interface ScriptedMemory {
  type: string
  content: string
  confidence?: number
  importance?: string
}

/** A well-formed extraction reply for the given memories. */
export function extractionReply(...memories: ScriptedMemory[]): string {
  return JSON.stringify(memories.map(m => ({
    type: m.type,
    content: m.content,
    confidence: m.confidence ?? 0.9,
    importance_level: m.importance ?? 'MEDIUM',
    tags: [],
    entities: []
  })))
}

export function verdictReply(...verdicts: { category: string; supersededId: string | null }[]): string {
  return JSON.stringify({
    verdicts: verdicts.map(v => ({ category: v.category, conflict: v.supersededId !== null, superseded_id: v.supersededId }))
  })
}
