import type { QueryIntent } from './types.js'

// The whole message must be the greeting, optionally followed by a bare addressee.
const GREETING = /^(hi|hello|hey|hiya|howdy|yo|sup|greetings|good (morning|afternoon|evening)|what'?s up)( (there|everyone|all|again|friend|folks|you))?$/

// Low-information acknowledgements and fillers: nothing to search for.
const FILLER = /^(ok|okay|kk|k|thanks|thank you|thx|ty|got it|sounds good|cool|nice|great|awesome|sure|yes|yep|yeah|no|nope|lol|haha|hmm+|alright|right|fine|done|go on|continue|tell me more|and\??|interesting|wow|really\??|bye|goodbye|see you|good night)$/

export interface IntentHints {
  /** Overrides classification when the orchestrator already knows. */
  intent?: QueryIntent
  turnNumber?: number
}

function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(/[’]/g, "'")
    .replace(/[^a-z0-9'?\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
}

export function isGreetingPhrase(text: string): boolean {
  const normalized = normalize(text).replace(/\?/g, '').trim()
  return GREETING.test(normalized)
}

export function isFiller(text: string): boolean {
  const normalized = normalize(text).replace(/\?+$/, '').trim()
  return normalized.length === 0 || FILLER.test(normalized)
}

/**
 * GREETING: a bare greeting on one of the first `greetingTurnWindow` turns
 * (or when the turn is unknown). BROAD: fillers, and greetings later in a
 * conversation. Everything else is SPECIFIC.
 */
export function classifyIntent(query: string, hints: IntentHints = {}, greetingTurnWindow = 2): QueryIntent {
  if (hints.intent) return hints.intent

  if (isGreetingPhrase(query)) {
    const early = hints.turnNumber === undefined || hints.turnNumber <= greetingTurnWindow
    return early ? 'GREETING' : 'BROAD'
  }
  if (isFiller(query)) return 'BROAD'
  return 'SPECIFIC'
}
