import type { ConflictCategory, ConversationTurn, Memory, MemoryCandidate } from './types.js'

export const EXTRACTION_SYSTEM_PROMPT = `You extract durable, user-specific memories from a conversation.
Only keep information that will still be useful in a future conversation.
Answer with JSON only.`

function formatTurn(turn: Pick<ConversationTurn, 'turnNumber' | 'userMessage' | 'assistantMessage'>): string {
  return `[turn ${turn.turnNumber}]
User: ${turn.userMessage}
Assistant: ${turn.assistantMessage}`
}

export function buildExtractionPrompt(
  turn: Pick<ConversationTurn, 'turnNumber' | 'userMessage' | 'assistantMessage'>,
  grounding: ConversationTurn[]
): string {
  const groundingBlock = grounding.length > 0
    ? `Earlier turns, for context only (do not extract from these):
${grounding.map(formatTurn).join('\n\n')}

`
    : ''

  return `${groundingBlock}Extract memories from this turn:
${formatTurn(turn)}

Types:
- FACT: a stable fact about the user ("works as a nurse", "has two cats")
- PREFERENCE: a like, dislike or preference ("favorite color is blue")
- COMMITMENT: something the user plans or promised to do, with any timing
- EPISODIC: a notable event that happened ("moved house last spring")
- ENTITY: a person, pet, place or organization important to the user

Importance:
- CRITICAL: identity, close relationships, health, life goals
- HIGH: strong preferences, commitments, recurring patterns
- MEDIUM: useful context
- LOW: passing detail

Write content in the third person ("User prefers tea"). Keep relative times as the user said them.
Skip greetings, small talk and anything about the assistant.

Return JSON only, an empty array when there is nothing worth keeping:
[{
  "type": "FACT" | "PREFERENCE" | "COMMITMENT" | "EPISODIC" | "ENTITY",
  "content": "one self-contained sentence",
  "confidence": 0.0-1.0,
  "importance_level": "CRITICAL" | "HIGH" | "MEDIUM" | "LOW",
  "tags": ["short", "topics"],
  "entities": ["named people, places or things"]
}]`
}

export const CLASSIFICATION_SYSTEM_PROMPT = `You detect contradictions between a new statement about a user and what is already known.
Answer with JSON only.`

export function buildClassificationPrompt(
  candidate: Pick<MemoryCandidate, 'content'>,
  existingByCategory: Map<ConflictCategory, Memory[]>
): string {
  const sections = Array.from(existingByCategory.entries()).map(([category, memories]) => {
    const lines = memories.map(m => `- id=${m.id} (${m.createdAt.toISOString().slice(0, 10)}): ${m.content}`)
    return `Category "${category}":\n${lines.join('\n')}`
  })

  return `New statement: "${candidate.content}"

Known memories, grouped by category:
${sections.join('\n\n')}

For each category, decide whether the new statement contradicts a known memory.
A contradiction means both cannot be true now (a new job replaces the old one, a move replaces the old city).
Additional, compatible information is not a contradiction.

Return JSON only:
{
  "verdicts": [{
    "category": "${Array.from(existingByCategory.keys()).join('" | "')}",
    "conflict": true | false,
    "superseded_id": "id of the contradicted memory, or null"
  }]
}`
}
