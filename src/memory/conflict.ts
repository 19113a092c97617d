import { describeError, withTimeout } from '../errors.js'
import { createLogger } from '../logger.js'
import type { CompletionFn } from '../providers/llm.js'
import type { Database } from '../storage/database.js'
import { parseJsonWith } from './json-extract.js'
import { CLASSIFICATION_SYSTEM_PROMPT, buildClassificationPrompt } from './prompts.js'
import { ClassificationEnvelopeSchema, VerdictSchema } from './schemas.js'
import { CONFLICT_CATEGORIES } from './types.js'
import type { ConflictCategory, ConflictCheck, Memory, MemoryType } from './types.js'

const log = createLogger('conflict')

const CATEGORY_PATTERNS: Record<ConflictCategory, RegExp[]> = {
  location: [
    /\b(lives?|living) in\b/i,
    /\b(based|located) in\b/i,
    /\bmoved to\b/i,
    /\b(is|am|comes?) from\b/i
  ],
  job: [
    /\bworks? (at|for|as)\b/i,
    /\bworking (at|for|as)\b/i,
    /\bemployed (by|at)\b/i,
    /\b(job|position|role) (at|as)\b/i
  ],
  relationship: [
    /\bmarried\b/i,
    /\b(dating|engaged|divorced|single)\b/i,
    /\bpartner\b/i
  ],
  age: [
    /\byears? old\b/i,
    /\bage (is|of)\b/i,
    /\bage:/i
  ],
  preference: [
    /\b(likes?|loves?|hates?|dislikes?|prefers?|enjoys?)\b/i,
    /\bfavou?rite\b/i
  ]
}

const MAX_EXISTING_PER_CATEGORY = 20

export function detectCategories(subject: { content: string; type: MemoryType }): ConflictCategory[] {
  return CONFLICT_CATEGORIES.filter(category =>
    (category === 'preference' && subject.type === 'PREFERENCE') ||
    CATEGORY_PATTERNS[category].some(re => re.test(subject.content))
  )
}

export interface ConflictOutcome {
  conflictCheck: ConflictCheck
  /** Existing memories the subject contradicts. */
  conflicting: Memory[]
}

export interface ConflictResolverConfig {
  db: Database
  completeFn: CompletionFn
  timeoutMs?: number
}

export class ConflictResolver {
  private db: Database
  private completeFn: CompletionFn
  private timeoutMs: number

  constructor(config: ConflictResolverConfig) {
    this.db = config.db
    this.completeFn = config.completeFn
    this.timeoutMs = config.timeoutMs ?? 30000
  }

  /**
   * Finds the user's active memories that `subject` contradicts, with one
   * classification call covering every category it touches. Fails open: a
   * failed call yields DEFERRED and no conflicts.
   */
  async resolve(
    userId: string,
    subject: { content: string; type: MemoryType },
    options: { excludeId?: string } = {}
  ): Promise<ConflictOutcome> {
    const categories = detectCategories(subject)
    if (categories.length === 0) return { conflictCheck: 'NOT_APPLICABLE', conflicting: [] }

    const grouped = new Map<ConflictCategory, Memory[]>()
    const active = this.db.getActiveMemories(userId).filter(m => m.id !== options.excludeId)
    for (const category of categories) {
      const related = active
        .filter(m => detectCategories(m).includes(category))
        .slice(-MAX_EXISTING_PER_CATEGORY)
      if (related.length > 0) grouped.set(category, related)
    }
    if (grouped.size === 0) return { conflictCheck: 'RESOLVED', conflicting: [] }

    let verdicts: unknown[]
    try {
      const text = await withTimeout(
        'llm',
        this.completeFn(buildClassificationPrompt(subject, grouped), {
          system: CLASSIFICATION_SYSTEM_PROMPT,
          maxOutputTokens: 1024
        }),
        this.timeoutMs
      )
      verdicts = parseJsonWith(text, ClassificationEnvelopeSchema)
    } catch (e) {
      log.warn(`classification failed, deferring: ${describeError(e)}`)
      return { conflictCheck: 'DEFERRED', conflicting: [] }
    }

    const conflicting = new Map<string, Memory>()
    for (const item of verdicts) {
      const parsed = VerdictSchema.safeParse(item)
      if (!parsed.success) {
        log.debug(`ignoring malformed verdict ${JSON.stringify(item)}`)
        continue
      }
      const verdict = parsed.data
      if (!verdict.conflict || !verdict.superseded_id) continue
      const candidates = grouped.get(verdict.category)
      const match = candidates?.find(m => m.id === verdict.superseded_id)
      if (match) conflicting.set(match.id, match)
      else log.debug(`ignoring verdict for unknown id ${verdict.superseded_id} in ${verdict.category}`)
    }

    return { conflictCheck: 'RESOLVED', conflicting: Array.from(conflicting.values()) }
  }
}
