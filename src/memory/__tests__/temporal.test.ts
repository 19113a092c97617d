import { describe, it, expect } from 'vitest'
import { anchorTemporalReferences } from '../temporal.js'

// Local time, since anchoring formats in the process time zone.
const reference = new Date(2026, 9, 18, 9, 0)

describe('Temporal anchoring', () => {
  it('anchors "tomorrow" with a time of day', () => {
    const result = anchorTemporalReferences('Dentist tomorrow at 3pm', reference)
    expect(result.content).toBe('Dentist tomorrow (October 19, 2026 at 03:00 PM) at 3pm')
    expect(result.resolvedAt).toEqual(new Date(2026, 9, 19, 15, 0))
  })

  it('anchors relative weeks, days and months to a date', () => {
    expect(anchorTemporalReferences('Trip to Lisbon next week', reference).content)
      .toBe('Trip to Lisbon next week (October 25, 2026)')
    expect(anchorTemporalReferences('Exam in 3 days', reference).content)
      .toBe('Exam in 3 days (October 21, 2026)')
    expect(anchorTemporalReferences('Lease ends in 2 months', reference).content)
      .toBe('Lease ends in 2 months (December 18, 2026)')
  })

  it('ignores a bare hour without minutes or am/pm', () => {
    const result = anchorTemporalReferences('Call mom tomorrow at 5', reference)
    expect(result.content).toBe('Call mom tomorrow (October 19, 2026) at 5')
    expect(result.resolvedAt).toEqual(new Date(2026, 9, 19, 9, 0))
  })

  it('handles 24-hour times with minutes', () => {
    const result = anchorTemporalReferences('Standup today at 17:30', reference)
    expect(result.content).toBe('Standup today (October 18, 2026 at 05:30 PM) at 17:30')
  })

  it('leaves text without relative phrases untouched', () => {
    expect(anchorTemporalReferences('User likes tea', reference)).toEqual({ content: 'User likes tea', resolvedAt: null })
  })
})
