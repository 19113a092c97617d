import { createHash } from 'node:crypto'
import type { ImportanceLevel } from './types.js'

export const IMPORTANCE_SCORES: Record<ImportanceLevel, number> = {
  CRITICAL: 1.0,
  HIGH: 0.75,
  MEDIUM: 0.5,
  LOW: 0.25
}

const LEVEL_RANK: Record<ImportanceLevel, number> = {
  LOW: 0,
  MEDIUM: 1,
  HIGH: 2,
  CRITICAL: 3
}

// Identity, close relationships and health, in first or third person.
const CRITICAL_PATTERNS: RegExp[] = [
  /\b(my|user'?s|their) name\b/i,
  /\bcall me\b/i,
  /\b(i'?m|am|is) called\b/i,
  /\b(my|user'?s|their|his|her) (wife|husband|partner|fianc[eé]e?|girlfriend|boyfriend)\b/i,
  /\b(my|user'?s|their|his|her) (son|daughter|kids?|children)\b/i,
  /\b(i'?m|am|is|are) allergic\b/i
]

const HIGH_PATTERNS: RegExp[] = [
  /\b(always|never)\b/i,
  /\b(deadline|appointment|promise[ds]?)\b/i,
  /\bremember (that|to)\b/i
]

export function importanceScore(level: ImportanceLevel): number {
  return IMPORTANCE_SCORES[level]
}

/**
 * Raises `level` when the content matches identity or obligation phrases.
 * Never lowers what the extractor assigned.
 */
export function promoteImportance(level: ImportanceLevel, content: string): ImportanceLevel {
  let floor: ImportanceLevel = 'LOW'
  if (CRITICAL_PATTERNS.some(re => re.test(content))) floor = 'CRITICAL'
  else if (HIGH_PATTERNS.some(re => re.test(content))) floor = 'HIGH'
  return LEVEL_RANK[floor] > LEVEL_RANK[level] ? floor : level
}

export function normalizeContent(content: string): string {
  return content
    .normalize('NFKC')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/[.!?;,\s]+$/, '')
}

export function contentHash(content: string): string {
  return createHash('sha256').update(normalizeContent(content)).digest('hex')
}
