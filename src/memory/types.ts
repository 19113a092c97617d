export const MEMORY_TYPES = ['FACT', 'PREFERENCE', 'COMMITMENT', 'EPISODIC', 'ENTITY'] as const
export type MemoryType = typeof MEMORY_TYPES[number]

export const IMPORTANCE_LEVELS = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW'] as const
export type ImportanceLevel = typeof IMPORTANCE_LEVELS[number]

export const INDEX_STATUSES = ['CREATED', 'INDEX_PENDING', 'INDEXED', 'INDEX_FAILED'] as const
export type IndexStatus = typeof INDEX_STATUSES[number]

export const CONFLICT_CHECKS = ['NOT_APPLICABLE', 'RESOLVED', 'DEFERRED'] as const
export type ConflictCheck = typeof CONFLICT_CHECKS[number]

export const CONFLICT_CATEGORIES = ['job', 'location', 'relationship', 'age', 'preference'] as const
export type ConflictCategory = typeof CONFLICT_CATEGORIES[number]

/** Per-type payload. Only commitments carry extra data today. */
export type MemoryVariant =
  | { type: 'FACT' }
  | { type: 'PREFERENCE' }
  | { type: 'COMMITMENT'; dueAt: Date | null }
  | { type: 'EPISODIC' }
  | { type: 'ENTITY' }

export interface CandidateFields {
  content: string
  confidence: number
  importanceLevel: ImportanceLevel
  tags: string[]
  entities: string[]
}

/** A validated memory proposed by extraction, not yet stored. */
export type MemoryCandidate = CandidateFields & MemoryVariant

export interface MemoryBase extends CandidateFields {
  id: string
  userId: string
  embedding: number[]
  importanceScore: number
  contentHash: string
  sourceTurn: number
  conversationId: string
  createdAt: Date
  lastAccessed: Date
  accessCount: number
  indexStatus: IndexStatus
  indexAttempts: number
  conflictCheck: ConflictCheck
  supersededBy: string | null
}

export type Memory = MemoryBase & MemoryVariant

export interface ConversationTurn {
  conversationId: string
  userId: string
  turnNumber: number
  userMessage: string
  assistantMessage: string
  createdAt: Date
}

export type QueryIntent = 'GREETING' | 'BROAD' | 'SPECIFIC'

export interface ScoreBreakdown {
  similarity: number
  importance: number
  recency: number
  accessFrequency: number
  confidence: number
}

export interface RankedMemory {
  memory: Memory
  score: number
  intent: QueryIntent
  breakdown: ScoreBreakdown
}

export function toVariant(type: MemoryType, dueAt: Date | null): MemoryVariant {
  switch (type) {
    case 'COMMITMENT':
      return { type, dueAt }
    case 'FACT':
    case 'PREFERENCE':
    case 'EPISODIC':
    case 'ENTITY':
      return { type }
  }
}

export function dueAtOf(memory: MemoryVariant): Date | null {
  return memory.type === 'COMMITMENT' ? memory.dueAt : null
}
