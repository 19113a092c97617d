import { describe, it, expect } from 'vitest'
import { formatMemoryContext } from '../context.js'
import type { Memory, RankedMemory } from '../types.js'
import { makeMemory } from '../../__tests__/fixtures.js'

function ranked(memory: Memory, score: number): RankedMemory {
  return {
    memory,
    score,
    intent: 'SPECIFIC',
    breakdown: { similarity: 0, importance: 0, recency: 0, accessFrequency: 0, confidence: 0 }
  }
}

describe('formatMemoryContext', () => {
  it('groups memories by type and renders due dates', () => {
    const block = formatMemoryContext([
      ranked(makeMemory({ content: 'User prefers tea', variant: { type: 'PREFERENCE' } }), 0.9),
      ranked(makeMemory({
        content: 'User has a dentist appointment',
        variant: { type: 'COMMITMENT', dueAt: new Date(2026, 9, 19, 15, 0) }
      }), 0.8),
      ranked(makeMemory({ content: 'User works as a nurse' }), 0.7),
      ranked(makeMemory({ content: 'User likes hiking', variant: { type: 'PREFERENCE' } }), 0.6)
    ])

    expect(block).toBe([
      'What you remember about this user:',
      '',
      'Facts about the user:',
      '- User works as a nurse',
      '',
      'Preferences:',
      '- User prefers tea',
      '- User likes hiking',
      '',
      'Commitments:',
      '- User has a dentist appointment (due October 19, 2026)'
    ].join('\n'))
  })

  it('omits the due date when a commitment has none', () => {
    const block = formatMemoryContext([
      ranked(makeMemory({ content: 'User will call the bank', variant: { type: 'COMMITMENT', dueAt: null } }), 0.5)
    ])
    expect(block.split('\n').at(-1)).toBe('- User will call the bank')
  })

  it('returns an empty string for no memories', () => {
    expect(formatMemoryContext([])).toBe('')
  })
})
