import type { KeepsakeConfig } from '../config.js'
import { describeError } from '../errors.js'
import { createLogger } from '../logger.js'
import type { Embedder } from '../providers/embeddings.js'
import type { DualStoreCoordinator } from '../storage/coordinator.js'
import type { Database } from '../storage/database.js'
import type { IndexMatch, SimilarityIndex } from '../storage/vector-index.js'
import { classifyIntent } from './intent.js'
import type { IntentHints } from './intent.js'
import { breakdownFor, rank, selectWithinBudget } from './scoring.js'
import type { ScoringParams } from './scoring.js'
import type { RankedMemory } from './types.js'

const log = createLogger('retrieval')

export interface HybridRetrieverConfig {
  db: Database
  coordinator: DualStoreCoordinator
  index: SimilarityIndex
  embedder: Embedder
  retrieval: KeepsakeConfig['retrieval']
  halfLifeDays: number
  /** Called with the ids of every returned memory, off the return path. */
  onAccess?: (ids: string[]) => void
  now?: () => Date
}

export class HybridRetriever {
  private db: Database
  private coordinator: DualStoreCoordinator
  private index: SimilarityIndex
  private embedder: Embedder
  private settings: KeepsakeConfig['retrieval']
  private halfLifeDays: number
  private onAccess: ((ids: string[]) => void) | null
  private now: () => Date

  constructor(config: HybridRetrieverConfig) {
    this.db = config.db
    this.coordinator = config.coordinator
    this.index = config.index
    this.embedder = config.embedder
    this.settings = config.retrieval
    this.halfLifeDays = config.halfLifeDays
    this.onAccess = config.onAccess ?? null
    this.now = config.now ?? (() => new Date())
  }

  /** Never throws: a broken store yields an empty list, a broken index a degraded ranking. */
  async retrieve(userId: string, query: string, hints: IntentHints = {}): Promise<RankedMemory[]> {
    const intent = classifyIntent(query, hints, this.settings.greetingTurnWindow)
    const params: ScoringParams = {
      weights: this.settings.weights,
      halfLifeDays: this.halfLifeDays,
      accessFrequencyScale: this.settings.accessFrequencyScale,
      now: this.now()
    }

    if (intent === 'BROAD') return []

    let ranked: RankedMemory[]
    try {
      ranked = intent === 'GREETING'
        ? await this.profile(userId, params)
        : await this.specific(userId, query, params)
    } catch (e) {
      log.error(`retrieval failed for ${userId}: ${describeError(e)}`)
      return []
    }

    this.notifyAccess(ranked)
    return ranked
  }

  private async profile(userId: string, params: ScoringParams): Promise<RankedMemory[]> {
    const profile = await this.coordinator.getProfile(userId)
    return profile.map(memory => {
      const breakdown = breakdownFor(memory, 0, params)
      return { memory, score: breakdown.importance, intent: 'GREETING' as const, breakdown }
    })
  }

  private async specific(userId: string, query: string, params: ScoringParams): Promise<RankedMemory[]> {
    let matches: IndexMatch[]
    try {
      const vector = await this.embedder.embed(query)
      matches = await this.index.query(vector, { userId }, this.settings.candidatePoolSize)
    } catch (e) {
      log.warn(`similarity search unavailable, ranking by importance and recency: ${describeError(e)}`)
      return this.degraded(userId, params)
    }

    const byId = new Map(this.db.getMemoriesByIds(matches.map(m => m.id)).map(m => [m.id, m] as const))
    const scored = matches.flatMap(match => {
      const memory = byId.get(match.id)
      if (!memory || memory.supersededBy !== null || memory.userId !== userId) return []
      return [{ memory, similarity: match.similarity }]
    })

    const ranked = rank(scored, params, 'SPECIFIC')
    return selectWithinBudget(ranked, this.settings.topK, this.settings.tokenBudget)
  }

  private degraded(userId: string, params: ScoringParams): RankedMemory[] {
    const recent = this.db.getRecentMemories(userId, { limit: this.settings.candidatePoolSize })
    const ranked = rank(recent.map(memory => ({ memory, similarity: 0 })), params, 'SPECIFIC', 'degraded')
    return selectWithinBudget(ranked, this.settings.topK, this.settings.tokenBudget)
  }

  private notifyAccess(ranked: RankedMemory[]): void {
    if (!this.onAccess || ranked.length === 0) return
    try {
      this.onAccess(ranked.map(r => r.memory.id))
    } catch (e) {
      log.warn(`access tracking failed: ${describeError(e)}`)
    }
  }
}
