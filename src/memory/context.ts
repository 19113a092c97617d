import { format } from 'date-fns'
import { MEMORY_TYPES, dueAtOf } from './types.js'
import type { Memory, MemoryType, RankedMemory } from './types.js'

const TYPE_HEADINGS: Record<MemoryType, string> = {
  FACT: 'Facts about the user:',
  PREFERENCE: 'Preferences:',
  COMMITMENT: 'Commitments:',
  EPISODIC: 'Past events:',
  ENTITY: 'People, places and things:'
}

/**
 * Renders retrieved memories as a prompt block for the chat orchestrator,
 * grouped by type in a fixed order and keeping ranked order within a group.
 * Returns an empty string when there is nothing to say.
 */
export function formatMemoryContext(ranked: RankedMemory[]): string {
  if (ranked.length === 0) return ''

  const sections: string[] = ['What you remember about this user:']

  for (const type of MEMORY_TYPES) {
    const memories = ranked.filter(r => r.memory.type === type).map(r => r.memory)
    if (memories.length > 0) {
      sections.push(buildSection(TYPE_HEADINGS[type], memories))
    }
  }

  return sections.join('\n\n')
}

function buildSection(heading: string, memories: Memory[]): string {
  return [heading, ...memories.map(formatLine)].join('\n')
}

function formatLine(memory: Memory): string {
  const due = dueAtOf(memory)
  return due ? `- ${memory.content} (due ${format(due, 'MMMM d, yyyy')})` : `- ${memory.content}`
}
