import {
  DuplicateConstraintViolation,
  ExternalServiceUnavailable,
  IndexInconsistency,
  describeError,
  withRetry
} from '../errors.js'
import type { RetryOptions } from '../errors.js'
import { createLogger } from '../logger.js'
import type { IndexStatus, Memory } from '../memory/types.js'
import { profileKey } from './cache.js'
import type { MemoryCache } from './cache.js'
import type { Database, MemoryStats } from './database.js'
import type { SimilarityIndex } from './vector-index.js'

const log = createLogger('coordinator')

export type PersistResult =
  | { status: 'stored'; memory: Memory }
  | { status: 'duplicate'; existing: Memory | null }

export interface ReindexReport {
  attempted: number
  indexed: number
  failed: number
}

/**
 * Index state after an upsert attempt. `attempts` includes the attempt just made.
 * CREATED never jumps straight to INDEX_FAILED, and INDEX_FAILED never returns to
 * INDEX_PENDING.
 */
export function nextIndexStatus(
  current: IndexStatus,
  succeeded: boolean,
  attempts: number,
  maxAttempts: number
): IndexStatus {
  if (succeeded) return 'INDEXED'
  switch (current) {
    case 'CREATED':
      return 'INDEX_PENDING'
    case 'INDEX_PENDING':
      return attempts >= maxAttempts ? 'INDEX_FAILED' : 'INDEX_PENDING'
    case 'INDEX_FAILED':
      return 'INDEX_FAILED'
    case 'INDEXED':
      return attempts >= maxAttempts ? 'INDEX_FAILED' : 'INDEX_PENDING'
  }
}

export interface DualStoreCoordinatorConfig {
  db: Database
  index: SimilarityIndex
  cache: MemoryCache
  retry?: RetryOptions
  maxIndexAttempts?: number
  now?: () => Date
}

/**
 * Owns every write that spans the durable store, the similarity index and the
 * cache. The store is written first and is authoritative.
 */
export class DualStoreCoordinator {
  private db: Database
  private index: SimilarityIndex
  private cache: MemoryCache
  private retry: RetryOptions
  private maxIndexAttempts: number
  private now: () => Date

  constructor(config: DualStoreCoordinatorConfig) {
    this.db = config.db
    this.index = config.index
    this.cache = config.cache
    this.retry = config.retry ?? { attempts: 3, baseDelayMs: 100, maxDelayMs: 2000 }
    this.maxIndexAttempts = config.maxIndexAttempts ?? 5
    this.now = config.now ?? (() => new Date())
  }

  async persist(memory: Memory): Promise<PersistResult> {
    const created: Memory = { ...memory, indexStatus: 'CREATED', indexAttempts: 0 }
    try {
      this.db.insertMemory(created)
    } catch (e) {
      if (e instanceof DuplicateConstraintViolation) {
        log.debug(`dropped concurrent duplicate for ${memory.userId}`)
        return { status: 'duplicate', existing: this.db.findActiveByHash(memory.userId, memory.contentHash) }
      }
      throw new ExternalServiceUnavailable('store', e)
    }

    const stored = await this.indexMemory(created)
    await this.invalidate(memory.userId)
    return { status: 'stored', memory: stored }
  }

  /** Returns false when `oldId` does not exist or is already superseded. */
  async supersede(oldId: string, newId: string): Promise<boolean> {
    const old = this.db.getMemory(oldId)
    if (!old || !this.db.supersede(oldId, newId)) return false

    try {
      await withRetry('index', () => this.index.delete(oldId), this.retry)
    } catch (e) {
      log.warn(`superseded ${oldId} but could not remove it from the index: ${describeError(e)}`)
    }
    await this.invalidate(old.userId)
    log.info(`${oldId} superseded by ${newId}`)
    return true
  }

  getMemory(id: string): Memory | null {
    return this.db.getMemory(id)
  }

  /** Active CRITICAL/HIGH memories, served from the cache when warm. */
  async getProfile(userId: string): Promise<Memory[]> {
    const key = profileKey(userId)
    try {
      const cached = await this.cache.get(key)
      if (cached) return cached
    } catch (e) {
      log.warn(`cache read failed for ${key}: ${describeError(e)}`)
    }

    const profile = this.db.getProfileMemories(userId)
    try {
      await this.cache.set(key, profile)
    } catch (e) {
      log.warn(`cache write failed for ${key}: ${describeError(e)}`)
    }
    return profile
  }

  recordAccess(ids: string[]): void {
    if (ids.length === 0) return
    this.db.recordAccess(ids, this.now())
  }

  /** Retries index upserts for INDEX_PENDING and INDEX_FAILED memories, oldest first. */
  async reindexPending(limit: number): Promise<ReindexReport> {
    const pending = this.db.getMemoriesByIndexStatus(['INDEX_PENDING', 'INDEX_FAILED'], limit)
    const report: ReindexReport = { attempted: pending.length, indexed: 0, failed: 0 }

    for (const memory of pending) {
      const updated = await this.indexMemory(memory)
      if (updated.indexStatus === 'INDEXED') report.indexed++
      else report.failed++
    }

    return report
  }

  stats(userId: string): MemoryStats {
    return this.db.getStats(userId)
  }

  private async indexMemory(memory: Memory): Promise<Memory> {
    const attempts = memory.indexAttempts + 1
    let succeeded = true
    try {
      await withRetry(
        'index',
        () => this.index.upsert(memory.id, memory.embedding, { userId: memory.userId, type: memory.type }),
        this.retry
      )
    } catch (e) {
      succeeded = false
      log.warn(`index upsert failed for ${memory.id} (attempt ${attempts}): ${describeError(e)}`)
    }

    const status = nextIndexStatus(memory.indexStatus, succeeded, attempts, this.maxIndexAttempts)
    this.db.updateIndexStatus(memory.id, status, attempts)
    if (status === 'INDEX_FAILED') {
      log.error(new IndexInconsistency(memory.id, `not indexed after ${attempts} attempts`).message)
    }
    return { ...memory, indexStatus: status, indexAttempts: attempts }
  }

  private async invalidate(userId: string): Promise<void> {
    try {
      await this.cache.delete(profileKey(userId))
    } catch (e) {
      log.warn(`cache invalidation failed for ${userId}: ${describeError(e)}`)
    }
  }
}
