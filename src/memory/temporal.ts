import { addDays, addMonths, addWeeks, format, set } from 'date-fns'

type Shift = (reference: Date, amount: number) => Date

interface RelativePattern {
  re: RegExp
  shift: Shift
  /** Fixed offset; when absent the first capture group supplies the amount. */
  amount?: number
}

const RELATIVE_PATTERNS: RelativePattern[] = [
  { re: /\btomorrow\b/i, shift: addDays, amount: 1 },
  { re: /\btoday\b/i, shift: addDays, amount: 0 },
  { re: /\byesterday\b/i, shift: addDays, amount: -1 },
  { re: /\bnext week\b/i, shift: addWeeks, amount: 1 },
  { re: /\bnext month\b/i, shift: addMonths, amount: 1 },
  { re: /\bin (\d{1,3}) days?\b/i, shift: addDays },
  { re: /\bin (\d{1,3}) weeks?\b/i, shift: addWeeks },
  { re: /\bin (\d{1,3}) months?\b/i, shift: addMonths }
]

const TIME_OF_DAY = /\bat (\d{1,2})(?::(\d{2}))?\s*(am|pm)?\b/i

export interface AnchoredText {
  content: string
  resolvedAt: Date | null
}

function parseTimeOfDay(text: string): { hours: number; minutes: number } | null {
  const match = TIME_OF_DAY.exec(text)
  if (!match) return null
  const [, rawHour, rawMinute, meridiem] = match
  // "at 5" alone is too ambiguous ("at 5 companies"), require minutes or am/pm
  if (rawMinute === undefined && meridiem === undefined) return null

  let hours = Number(rawHour)
  const minutes = rawMinute === undefined ? 0 : Number(rawMinute)
  if (meridiem) {
    const pm = meridiem.toLowerCase() === 'pm'
    if (hours < 1 || hours > 12) return null
    if (pm && hours < 12) hours += 12
    if (!pm && hours === 12) hours = 0
  }
  if (hours > 23 || minutes > 59) return null
  return { hours, minutes }
}

/**
 * Appends the absolute date to the first relative time phrase in `text`,
 * e.g. "dentist tomorrow at 3pm" -> "dentist tomorrow (October 19, 2026 at 03:00 PM) at 3pm".
 */
export function anchorTemporalReferences(text: string, reference: Date): AnchoredText {
  for (const pattern of RELATIVE_PATTERNS) {
    const match = pattern.re.exec(text)
    if (!match) continue

    const amount = pattern.amount ?? Number(match[1])
    let resolved = pattern.shift(reference, amount)
    const time = parseTimeOfDay(text)
    if (time) {
      resolved = set(resolved, { hours: time.hours, minutes: time.minutes, seconds: 0, milliseconds: 0 })
    }

    const label = time
      ? `${format(resolved, 'MMMM d, yyyy')} at ${format(resolved, 'hh:mm a')}`
      : format(resolved, 'MMMM d, yyyy')
    const end = match.index + match[0].length
    return {
      content: `${text.slice(0, end)} (${label})${text.slice(end)}`,
      resolvedAt: resolved
    }
  }

  return { content: text, resolvedAt: null }
}
