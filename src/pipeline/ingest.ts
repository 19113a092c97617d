import { nanoid } from 'nanoid'
import { describeError, withRetry } from '../errors.js'
import type { RetryOptions } from '../errors.js'
import { createLogger } from '../logger.js'
import type { ConflictResolver } from '../memory/conflict.js'
import type { DeduplicationFilter } from '../memory/dedup.js'
import type { ExtractionPipeline } from '../memory/extraction.js'
import { contentHash, importanceScore } from '../memory/importance.js'
import type { ConflictCheck, ConversationTurn, Memory, MemoryCandidate } from '../memory/types.js'
import type { Embedder } from '../providers/embeddings.js'
import type { DualStoreCoordinator } from '../storage/coordinator.js'
import type { Database } from '../storage/database.js'

const log = createLogger('ingest')

export interface IngestReport {
  candidates: number
  stored: number
  duplicates: number
  superseded: number
  deferred: number
  /** Candidates lost because their embeddings could not be produced. */
  dropped: number
}

export interface IngestPipelineConfig {
  db: Database
  coordinator: DualStoreCoordinator
  extraction: ExtractionPipeline
  dedup: DeduplicationFilter
  conflicts: ConflictResolver
  embedder: Embedder
  groundingTurns?: number
  retry?: RetryOptions
  now?: () => Date
}

export function buildMemory(
  turn: ConversationTurn,
  candidate: MemoryCandidate,
  embedding: number[],
  conflictCheck: ConflictCheck,
  createdAt: Date
): Memory {
  return {
    ...candidate,
    id: nanoid(),
    userId: turn.userId,
    embedding,
    importanceScore: importanceScore(candidate.importanceLevel),
    contentHash: contentHash(candidate.content),
    sourceTurn: turn.turnNumber,
    conversationId: turn.conversationId,
    createdAt,
    lastAccessed: createdAt,
    accessCount: 0,
    indexStatus: 'CREATED',
    indexAttempts: 0,
    conflictCheck,
    supersededBy: null
  }
}

/** Extraction → Dedup → Conflict resolution → Coordinator, for one recorded turn. */
export class IngestPipeline {
  private db: Database
  private coordinator: DualStoreCoordinator
  private extraction: ExtractionPipeline
  private dedup: DeduplicationFilter
  private conflicts: ConflictResolver
  private embedder: Embedder
  private groundingTurns: number
  private retry: RetryOptions
  private now: () => Date

  constructor(config: IngestPipelineConfig) {
    this.db = config.db
    this.coordinator = config.coordinator
    this.extraction = config.extraction
    this.dedup = config.dedup
    this.conflicts = config.conflicts
    this.embedder = config.embedder
    this.groundingTurns = config.groundingTurns ?? 3
    this.retry = config.retry ?? { attempts: 3, baseDelayMs: 100, maxDelayMs: 2000 }
    this.now = config.now ?? (() => new Date())
  }

  async processTurn(turn: ConversationTurn): Promise<IngestReport> {
    const report: IngestReport = { candidates: 0, stored: 0, duplicates: 0, superseded: 0, deferred: 0, dropped: 0 }

    const grounding = this.db.getTurnsBefore(turn.conversationId, turn.turnNumber, this.groundingTurns)
    const candidates = await this.extraction.extract({ turn, grounding })
    report.candidates = candidates.length
    if (candidates.length === 0) return report

    let embeddings: number[][]
    try {
      embeddings = await withRetry('embedder', () => this.embedder.embedMany(candidates.map(c => c.content)), this.retry)
    } catch (e) {
      log.error(`dropping ${candidates.length} candidates from turn ${turn.turnNumber}: ${describeError(e)}`)
      report.dropped = candidates.length
      return report
    }
    if (embeddings.length !== candidates.length) {
      log.error(`embedder returned ${embeddings.length} vectors for ${candidates.length} candidates`)
      report.dropped = candidates.length
      return report
    }

    // Sequential so later candidates of the same turn see earlier ones in dedup.
    for (let i = 0; i < candidates.length; i++) {
      await this.processCandidate(turn, candidates[i], embeddings[i], report)
    }

    log.info(
      `turn ${turn.conversationId}#${turn.turnNumber}: ${report.stored} stored, ` +
      `${report.duplicates} duplicate, ${report.superseded} superseded, ${report.deferred} deferred`
    )
    return report
  }

  private async processCandidate(
    turn: ConversationTurn,
    candidate: MemoryCandidate,
    embedding: number[],
    report: IngestReport
  ): Promise<void> {
    const verdict = await this.dedup.check(turn.userId, candidate, embedding)
    if (verdict.duplicate) {
      report.duplicates++
      return
    }

    const outcome = await this.conflicts.resolve(turn.userId, candidate)
    const memory = buildMemory(turn, candidate, embedding, outcome.conflictCheck, this.now())

    const result = await this.coordinator.persist(memory)
    if (result.status === 'duplicate') {
      report.duplicates++
      return
    }

    report.stored++
    if (outcome.conflictCheck === 'DEFERRED') report.deferred++

    for (const old of outcome.conflicting) {
      if (await this.coordinator.supersede(old.id, memory.id)) report.superseded++
    }
  }
}
