import type { KeepsakeConfig } from './config.js'
import { describeError } from './errors.js'
import { createLogger } from './logger.js'
import { ConflictResolver } from './memory/conflict.js'
import { DeduplicationFilter } from './memory/dedup.js'
import { ExtractionPipeline } from './memory/extraction.js'
import type { IntentHints } from './memory/intent.js'
import { HybridRetriever } from './memory/retrieval.js'
import type { ConversationTurn, Memory, RankedMemory } from './memory/types.js'
import { IngestPipeline } from './pipeline/ingest.js'
import { Reconciler } from './pipeline/reconciler.js'
import type { SweepReport } from './pipeline/reconciler.js'
import { WorkQueue } from './pipeline/work-queue.js'
import type { WorkQueueStats } from './pipeline/work-queue.js'
import type { Embedder } from './providers/embeddings.js'
import type { CompletionFn } from './providers/llm.js'
import type { MemoryCache } from './storage/cache.js'
import { DualStoreCoordinator } from './storage/coordinator.js'
import type { Database, MemoryStats } from './storage/database.js'
import type { SimilarityIndex } from './storage/vector-index.js'

export { formatMemoryContext } from './memory/context.js'
export type { IntentHints } from './memory/intent.js'
export type { Memory, MemoryType, QueryIntent, RankedMemory, ScoreBreakdown } from './memory/types.js'

const log = createLogger('engine')

export interface TurnInput {
  userId: string
  conversationId: string
  turnNumber: number
  userMessage: string
  assistantMessage: string
  createdAt?: Date
}

export type IngestReceipt =
  | { accepted: true; conversationId: string; turnNumber: number }
  | { accepted: false; reason: 'invalid_turn' | 'out_of_order' | 'store_unavailable' | 'queue_full' }

export interface MemoryEngineConfig {
  config: KeepsakeConfig
  db: Database
  index: SimilarityIndex
  cache: MemoryCache
  embedder: Embedder
  extractionFn: CompletionFn
  classificationFn: CompletionFn
  now?: () => Date
}

/** The upward interface used by a chat orchestrator. */
export class MemoryEngine {
  readonly coordinator: DualStoreCoordinator
  private db: Database
  private queue: WorkQueue
  private pipeline: IngestPipeline
  private retriever: HybridRetriever
  private reconciler: Reconciler
  private now: () => Date

  constructor(options: MemoryEngineConfig) {
    const { config, db } = options
    this.db = db
    this.now = options.now ?? (() => new Date())

    this.queue = new WorkQueue(config.worker)
    this.coordinator = new DualStoreCoordinator({
      db,
      index: options.index,
      cache: options.cache,
      retry: config.index.retry,
      maxIndexAttempts: config.index.maxAttempts,
      now: this.now
    })

    const conflicts = new ConflictResolver({
      db,
      completeFn: options.classificationFn,
      timeoutMs: config.llm.timeoutMs
    })

    this.pipeline = new IngestPipeline({
      db,
      coordinator: this.coordinator,
      extraction: new ExtractionPipeline({
        completeFn: options.extractionFn,
        minConfidence: config.memory.minConfidence,
        timeoutMs: config.llm.timeoutMs
      }),
      dedup: new DeduplicationFilter({
        db,
        coordinator: this.coordinator,
        threshold: config.memory.duplicateThreshold,
        neighborCount: config.memory.dedupNeighborCount,
        sameTypeOnly: config.memory.dedupSameTypeOnly
      }),
      conflicts,
      embedder: options.embedder,
      groundingTurns: config.memory.groundingTurns,
      retry: config.index.retry,
      now: this.now
    })

    this.retriever = new HybridRetriever({
      db,
      coordinator: this.coordinator,
      index: options.index,
      embedder: options.embedder,
      retrieval: config.retrieval,
      halfLifeDays: config.memory.decayHalfLifeDays,
      onAccess: ids => this.trackAccess(ids),
      now: this.now
    })

    this.reconciler = new Reconciler({
      db,
      coordinator: this.coordinator,
      conflicts,
      batchSize: config.reconciliation.batchSize,
      duplicateThreshold: config.memory.duplicateThreshold
    })
  }

  /**
   * Records the turn and schedules memory extraction in the background.
   * Returns before any memory is written.
   */
  ingestTurn(input: TurnInput): IngestReceipt {
    if (!input.userId || !input.conversationId || !Number.isInteger(input.turnNumber) || input.turnNumber < 0) {
      log.warn(`rejecting malformed turn ${input.conversationId}#${input.turnNumber}`)
      return { accepted: false, reason: 'invalid_turn' }
    }

    const turn: ConversationTurn = {
      conversationId: input.conversationId,
      userId: input.userId,
      turnNumber: input.turnNumber,
      userMessage: input.userMessage,
      assistantMessage: input.assistantMessage,
      createdAt: input.createdAt ?? this.now()
    }

    const jobName = `ingest ${turn.conversationId}#${turn.turnNumber}`
    // Nothing is recorded for a refused turn, so the caller can resend it.
    if (!this.queue.admits(jobName)) return { accepted: false, reason: 'queue_full' }

    try {
      if (!this.db.insertTurn(turn)) {
        log.warn(`turn ${turn.conversationId}#${turn.turnNumber} is not after the last recorded turn`)
        return { accepted: false, reason: 'out_of_order' }
      }
    } catch (e) {
      log.error(`could not record turn ${turn.conversationId}#${turn.turnNumber}: ${describeError(e)}`)
      return { accepted: false, reason: 'store_unavailable' }
    }

    const queued = this.queue.enqueue(jobName, async () => {
      await this.pipeline.processTurn(turn)
    })
    if (!queued) return { accepted: false, reason: 'queue_full' }

    return { accepted: true, conversationId: turn.conversationId, turnNumber: turn.turnNumber }
  }

  retrieve(userId: string, query: string, hints: IntentHints = {}): Promise<RankedMemory[]> {
    return this.retriever.retrieve(userId, query, hints)
  }

  /** Runs one reconciliation sweep. */
  reconcile(): Promise<SweepReport> {
    return this.reconciler.sweep()
  }

  getMemory(id: string): Memory | null {
    return this.coordinator.getMemory(id)
  }

  stats(userId: string): MemoryStats {
    return this.coordinator.stats(userId)
  }

  queueStats(): WorkQueueStats {
    return this.queue.stats()
  }

  /** Waits for background work accepted so far. */
  drain(): Promise<void> {
    return this.queue.onIdle()
  }

  /** Stops accepting turns and waits for queued work. */
  close(): Promise<void> {
    return this.queue.close()
  }

  private trackAccess(ids: string[]): void {
    this.queue.enqueue('access', async () => {
      this.coordinator.recordAccess(ids)
    })
  }
}
