import { createLogger } from '../logger.js'
import type { DualStoreCoordinator } from '../storage/coordinator.js'
import type { Database } from '../storage/database.js'
import { contentHash } from './importance.js'
import { cosineSimilarity } from './math.js'
import type { Memory, MemoryCandidate } from './types.js'

const log = createLogger('dedup')

export type DedupVerdict =
  | { duplicate: false }
  | { duplicate: true; existing: Memory; similarity: number; reason: 'hash' | 'similarity' }

export interface DeduplicationFilterConfig {
  db: Database
  coordinator: DualStoreCoordinator
  threshold?: number
  neighborCount?: number
  sameTypeOnly?: boolean
}

interface Neighbor {
  memory: Memory
  similarity: number
}

/** Higher similarity first; ties go to the more used, then the older memory. */
function preferNeighbor(a: Neighbor, b: Neighbor): number {
  if (b.similarity !== a.similarity) return b.similarity - a.similarity
  if (b.memory.accessCount !== a.memory.accessCount) return b.memory.accessCount - a.memory.accessCount
  return a.memory.createdAt.getTime() - b.memory.createdAt.getTime()
}

export class DeduplicationFilter {
  private db: Database
  private coordinator: DualStoreCoordinator
  private threshold: number
  private neighborCount: number
  private sameTypeOnly: boolean

  constructor(config: DeduplicationFilterConfig) {
    this.db = config.db
    this.coordinator = config.coordinator
    this.threshold = config.threshold ?? 0.95
    this.neighborCount = config.neighborCount ?? 50
    this.sameTypeOnly = config.sameTypeOnly ?? false
  }

  /**
   * Compares a candidate against the user's most recent active memories.
   * A duplicate reinforces the memory it matched instead of being stored.
   */
  async check(userId: string, candidate: MemoryCandidate, embedding: number[]): Promise<DedupVerdict> {
    const verdict = this.findDuplicate(userId, candidate, embedding)
    if (verdict.duplicate) {
      this.coordinator.recordAccess([verdict.existing.id])
      log.debug(`"${candidate.content.slice(0, 60)}" matches ${verdict.existing.id} by ${verdict.reason}`)
    }
    return verdict
  }

  private findDuplicate(userId: string, candidate: MemoryCandidate, embedding: number[]): DedupVerdict {
    const exact = this.db.findActiveByHash(userId, contentHash(candidate.content))
    if (exact) return { duplicate: true, existing: exact, similarity: 1, reason: 'hash' }

    const neighbors = this.db.getRecentMemories(userId, {
      limit: this.neighborCount,
      type: this.sameTypeOnly ? candidate.type : undefined
    })
    if (neighbors.length === 0) return { duplicate: false }

    const [best] = neighbors
      .map(memory => ({ memory, similarity: cosineSimilarity(embedding, memory.embedding) }))
      .sort(preferNeighbor)

    if (best && best.similarity >= this.threshold) {
      return { duplicate: true, existing: best.memory, similarity: best.similarity, reason: 'similarity' }
    }
    return { duplicate: false }
  }
}
