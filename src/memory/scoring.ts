import type { ScoringWeights } from '../config.js'
import { ageInDays, recency } from './decay.js'
import { clamp01 } from './math.js'
import type { Memory, QueryIntent, RankedMemory, ScoreBreakdown } from './types.js'

export interface ScoringParams {
  weights: ScoringWeights
  halfLifeDays: number
  accessFrequencyScale: number
  now: Date
}

export function accessFrequency(accessCount: number, scale: number): number {
  if (accessCount <= 0) return 0
  return Math.min(1, Math.log(1 + accessCount) / scale)
}

export function breakdownFor(memory: Memory, similarity: number, params: ScoringParams): ScoreBreakdown {
  return {
    similarity: clamp01(similarity),
    importance: memory.supersededBy === null ? clamp01(memory.importanceScore) : 0,
    recency: recency(ageInDays(memory.createdAt, params.now), params.halfLifeDays),
    accessFrequency: accessFrequency(memory.accessCount, params.accessFrequencyScale),
    confidence: clamp01(memory.confidence)
  }
}

export function compositeScore(b: ScoreBreakdown, weights: ScoringWeights): number {
  return (
    weights.similarity * b.similarity +
    weights.importance * b.importance +
    weights.recency * b.recency +
    weights.accessFrequency * b.accessFrequency +
    weights.confidence * b.confidence
  )
}

/** Fallback when no similarity is available: importance and recency terms only. */
export function degradedScore(b: ScoreBreakdown, weights: ScoringWeights): number {
  return weights.importance * b.importance + weights.recency * b.recency
}

export function rank(
  memories: { memory: Memory; similarity: number }[],
  params: ScoringParams,
  intent: QueryIntent,
  mode: 'hybrid' | 'degraded' = 'hybrid'
): RankedMemory[] {
  const ranked = memories.map(({ memory, similarity }) => {
    const breakdown = breakdownFor(memory, similarity, params)
    const score = mode === 'hybrid'
      ? compositeScore(breakdown, params.weights)
      : degradedScore(breakdown, params.weights)
    return { memory, score, intent, breakdown }
  })
  return ranked.sort(compareRanked)
}

/** Score desc, then newest first, then id for a stable order. */
export function compareRanked(a: RankedMemory, b: RankedMemory): number {
  if (b.score !== a.score) return b.score - a.score
  const byCreated = b.memory.createdAt.getTime() - a.memory.createdAt.getTime()
  if (byCreated !== 0) return byCreated
  return a.memory.id < b.memory.id ? -1 : a.memory.id > b.memory.id ? 1 : 0
}

const TOKENS_PER_MEMORY_OVERHEAD = 8

export function estimateTokens(memory: Memory): number {
  return Math.ceil(memory.content.length / 4) + TOKENS_PER_MEMORY_OVERHEAD
}

/**
 * Takes the first `topK` of an already sorted list, then drops from the tail
 * (lowest score) until the estimated token total fits `tokenBudget`.
 */
export function selectWithinBudget(sorted: RankedMemory[], topK: number, tokenBudget: number): RankedMemory[] {
  const selected = sorted.slice(0, Math.max(0, topK))
  let total = selected.reduce((sum, r) => sum + estimateTokens(r.memory), 0)
  while (selected.length > 0 && total > tokenBudget) {
    const dropped = selected.pop()
    if (dropped) total -= estimateTokens(dropped.memory)
  }
  return selected
}
