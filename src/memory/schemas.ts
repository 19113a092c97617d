import { z } from 'zod'
import { CONFLICT_CATEGORIES, IMPORTANCE_LEVELS, MEMORY_TYPES } from './types.js'

const upperCased = z.string().transform(s => s.trim().toUpperCase())
const lowerCased = z.string().transform(s => s.trim().toLowerCase())

const stringSet = z
  .array(z.string())
  .default([])
  .transform(values => Array.from(new Set(values.map(v => v.trim()).filter(v => v.length > 0))))

export const RawCandidateSchema = z.object({
  type: upperCased.pipe(z.enum(MEMORY_TYPES)),
  content: z.string().trim().min(1).max(5000),
  confidence: z.number().min(0).max(1),
  importance_level: upperCased.pipe(z.enum(IMPORTANCE_LEVELS)),
  tags: stringSet,
  entities: stringSet
})

export type RawCandidate = z.infer<typeof RawCandidateSchema>

/** The extractor may answer with a bare array or wrap it as `{ memories: [...] }`. */
export const ExtractionEnvelopeSchema = z.union([
  z.array(z.unknown()),
  z.object({ memories: z.array(z.unknown()) }).transform(o => o.memories)
])

export const VerdictSchema = z.object({
  category: lowerCased.pipe(z.enum(CONFLICT_CATEGORIES)),
  conflict: z.boolean(),
  superseded_id: z.string().min(1).nullish()
})

export type Verdict = z.infer<typeof VerdictSchema>

/** Verdicts are validated one by one so a single malformed entry does not sink the rest. */
export const ClassificationEnvelopeSchema = z.union([
  z.array(z.unknown()),
  z.object({ verdicts: z.array(z.unknown()) }).transform(o => o.verdicts)
])
