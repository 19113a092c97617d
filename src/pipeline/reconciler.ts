import { describeError } from '../errors.js'
import { createLogger } from '../logger.js'
import type { ConflictResolver } from '../memory/conflict.js'
import { cosineSimilarity } from '../memory/math.js'
import type { Memory } from '../memory/types.js'
import type { DualStoreCoordinator, ReindexReport } from '../storage/coordinator.js'
import type { Database } from '../storage/database.js'

const log = createLogger('sweep')

export interface SweepReport {
  reindex: ReindexReport
  deferredResolved: number
  deferredRemaining: number
  superseded: number
  consolidated: number
}

export interface ReconcilerConfig {
  db: Database
  coordinator: DualStoreCoordinator
  conflicts: ConflictResolver
  batchSize?: number
  duplicateThreshold?: number
}

/**
 * Periodic repair pass: retries index writes, settles conflicts that were
 * deferred at ingest time, and folds near-duplicates that slipped past dedup.
 */
export class Reconciler {
  private db: Database
  private coordinator: DualStoreCoordinator
  private conflicts: ConflictResolver
  private batchSize: number
  private duplicateThreshold: number
  private running: Promise<SweepReport> | null = null

  constructor(config: ReconcilerConfig) {
    this.db = config.db
    this.coordinator = config.coordinator
    this.conflicts = config.conflicts
    this.batchSize = config.batchSize ?? 100
    this.duplicateThreshold = config.duplicateThreshold ?? 0.95
  }

  /** Overlapping calls share the sweep already in progress. */
  sweep(): Promise<SweepReport> {
    if (!this.running) {
      this.running = this.runSweep().finally(() => {
        this.running = null
      })
    }
    return this.running
  }

  private async runSweep(): Promise<SweepReport> {
    const report: SweepReport = {
      reindex: await this.coordinator.reindexPending(this.batchSize),
      deferredResolved: 0,
      deferredRemaining: 0,
      superseded: 0,
      consolidated: 0
    }

    for (const memory of this.db.getDeferredConflicts(this.batchSize)) {
      await this.settleDeferred(memory, report)
    }

    for (const userId of this.db.listUserIds()) {
      try {
        report.consolidated += await this.consolidate(userId)
      } catch (e) {
        log.error(`consolidation failed for ${userId}: ${describeError(e)}`)
      }
    }

    log.info(
      `reindexed ${report.reindex.indexed}/${report.reindex.attempted}, ` +
      `settled ${report.deferredResolved} deferred (${report.deferredRemaining} left), ` +
      `superseded ${report.superseded}, consolidated ${report.consolidated}`
    )
    return report
  }

  /** Recency wins: of two conflicting memories the newer one stays active. */
  private async settleDeferred(memory: Memory, report: SweepReport): Promise<void> {
    if (memory.supersededBy !== null) {
      this.db.setConflictCheck(memory.id, 'RESOLVED')
      report.deferredResolved++
      return
    }

    const outcome = await this.conflicts.resolve(memory.userId, memory, { excludeId: memory.id })
    if (outcome.conflictCheck === 'DEFERRED') {
      report.deferredRemaining++
      return
    }

    for (const other of outcome.conflicting) {
      const memoryIsNewer = other.createdAt.getTime() <= memory.createdAt.getTime()
      const [older, newer] = memoryIsNewer ? [other, memory] : [memory, other]
      if (await this.coordinator.supersede(older.id, newer.id)) report.superseded++
      if (!memoryIsNewer) break
    }

    this.db.setConflictCheck(memory.id, outcome.conflictCheck)
    report.deferredResolved++
  }

  /** Folds each older active memory into its most recent near-duplicate, which stays active. */
  private async consolidate(userId: string): Promise<number> {
    const oldestFirst = this.db.getRecentMemories(userId, { limit: this.batchSize }).reverse()
    const kept: Memory[] = []
    let consolidated = 0

    for (const memory of oldestFirst) {
      const twin = kept.find(k =>
        k.contentHash === memory.contentHash ||
        cosineSimilarity(k.embedding, memory.embedding) >= this.duplicateThreshold
      )
      if (!twin) {
        kept.push(memory)
        continue
      }
      if (await this.coordinator.supersede(twin.id, memory.id)) {
        this.coordinator.recordAccess([memory.id])
        kept[kept.indexOf(twin)] = memory
        consolidated++
      }
    }

    return consolidated
  }
}
