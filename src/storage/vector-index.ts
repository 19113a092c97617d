import { cosineSimilarity } from '../memory/math.js'
import type { MemoryType } from '../memory/types.js'

export interface IndexMetadata {
  userId: string
  type: MemoryType
}

export interface IndexMatch {
  id: string
  similarity: number
}

/** Approximate nearest-neighbour store. Implementations may live out of process and fail. */
export interface SimilarityIndex {
  upsert(id: string, vector: number[], metadata: IndexMetadata): Promise<void>
  query(vector: number[], filter: { userId: string }, topK: number): Promise<IndexMatch[]>
  delete(id: string): Promise<void>
}

interface IndexEntry extends IndexMetadata {
  vector: number[]
}

/** Brute-force cosine index held in process memory; rebuilt from the store on wake. */
export class InMemoryVectorIndex implements SimilarityIndex {
  private entries = new Map<string, IndexEntry>()

  get size(): number {
    return this.entries.size
  }

  has(id: string): boolean {
    return this.entries.has(id)
  }

  async upsert(id: string, vector: number[], metadata: IndexMetadata): Promise<void> {
    this.entries.set(id, { ...metadata, vector: [...vector] })
  }

  async query(vector: number[], filter: { userId: string }, topK: number): Promise<IndexMatch[]> {
    const scored: IndexMatch[] = []

    for (const [id, entry] of this.entries) {
      if (entry.userId !== filter.userId) continue
      scored.push({ id, similarity: cosineSimilarity(vector, entry.vector) })
    }

    scored.sort((a, b) => b.similarity - a.similarity || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))

    return scored.slice(0, Math.max(0, topK))
  }

  async delete(id: string): Promise<void> {
    this.entries.delete(id)
  }
}
