import { ExtractionParseError, describeError, withTimeout } from '../errors.js'
import { createLogger } from '../logger.js'
import type { CompletionFn } from '../providers/llm.js'
import { promoteImportance } from './importance.js'
import { parseJsonWith } from './json-extract.js'
import { EXTRACTION_SYSTEM_PROMPT, buildExtractionPrompt } from './prompts.js'
import { ExtractionEnvelopeSchema, RawCandidateSchema } from './schemas.js'
import type { RawCandidate } from './schemas.js'
import { anchorTemporalReferences } from './temporal.js'
import { toVariant } from './types.js'
import type { ConversationTurn, MemoryCandidate } from './types.js'

const log = createLogger('extraction')

export interface TurnContext {
  turn: ConversationTurn
  /** Prior turns of the same conversation, oldest first. */
  grounding: ConversationTurn[]
}

export interface ExtractionPipelineConfig {
  completeFn: CompletionFn
  minConfidence?: number
  timeoutMs?: number
}

export class ExtractionPipeline {
  private completeFn: CompletionFn
  private minConfidence: number
  private timeoutMs: number

  constructor(config: ExtractionPipelineConfig) {
    this.completeFn = config.completeFn
    this.minConfidence = config.minConfidence ?? 0.5
    this.timeoutMs = config.timeoutMs ?? 30000
  }

  /**
   * One completion call per turn. Invalid candidates are dropped one by one;
   * a failed or unparseable call yields no candidates.
   */
  async extract(context: TurnContext): Promise<MemoryCandidate[]> {
    const { turn } = context
    let text: string
    try {
      text = await withTimeout(
        'llm',
        this.completeFn(buildExtractionPrompt(turn, context.grounding), {
          system: EXTRACTION_SYSTEM_PROMPT,
          maxOutputTokens: 2048
        }),
        this.timeoutMs
      )
    } catch (e) {
      log.warn(`turn ${turn.conversationId}#${turn.turnNumber}: extraction call failed: ${describeError(e)}`)
      return []
    }

    let items: unknown[]
    try {
      items = parseJsonWith(text, ExtractionEnvelopeSchema)
    } catch (e) {
      log.warn(`turn ${turn.conversationId}#${turn.turnNumber}: ${describeError(e)}`)
      return []
    }

    const candidates: MemoryCandidate[] = []
    items.forEach((item, i) => {
      const parsed = RawCandidateSchema.safeParse(item)
      if (!parsed.success) {
        const issue = parsed.error.issues[0]
        const err = new ExtractionParseError(
          `candidate ${i} rejected: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`,
          String(JSON.stringify(item))
        )
        log.warn(err.message)
        return
      }
      if (parsed.data.confidence < this.minConfidence) {
        log.debug(`candidate ${i} below confidence floor (${parsed.data.confidence})`)
        return
      }
      candidates.push(toCandidate(parsed.data, turn.createdAt))
    })

    log.debug(`turn ${turn.conversationId}#${turn.turnNumber}: ${candidates.length}/${items.length} candidates kept`)
    return candidates
  }
}

export function toCandidate(raw: RawCandidate, reference: Date): MemoryCandidate {
  const anchored = anchorTemporalReferences(raw.content, reference)
  return {
    ...toVariant(raw.type, anchored.resolvedAt),
    content: anchored.content,
    confidence: raw.confidence,
    importanceLevel: promoteImportance(raw.importance_level, raw.content),
    tags: raw.tags,
    entities: raw.entities
  }
}
