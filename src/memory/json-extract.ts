import type { z } from 'zod'
import { ExtractionParseError } from '../errors.js'

export function stripCodeFences(text: string): string {
  return text.replace(/```(?:json)?\s*([\s\S]*?)```/gi, (_match, inner: string) => inner.trim())
}

/** Every top-level `{...}` or `[...]` block, skipping brackets inside strings. */
export function scanBalancedJson(text: string): string[] {
  const blocks: string[] = []

  for (let i = 0; i < text.length; i++) {
    const open = text[i]
    if (open !== '{' && open !== '[') continue
    const close = open === '{' ? '}' : ']'

    let depth = 0
    let inString = false
    let escaped = false
    for (let j = i; j < text.length; j++) {
      const ch = text[j]
      if (inString) {
        if (escaped) escaped = false
        else if (ch === '\\') escaped = true
        else if (ch === '"') inString = false
        continue
      }
      if (ch === '"') {
        inString = true
        continue
      }
      if (ch === open) depth++
      if (ch === close) depth--
      if (depth === 0) {
        blocks.push(text.slice(i, j + 1))
        i = j
        break
      }
    }
  }

  return blocks
}

export function jsonCandidates(text: string): string[] {
  const cleaned = stripCodeFences(text.trim())
  const candidates = [cleaned, ...scanBalancedJson(cleaned)]
  return Array.from(new Set(candidates.map(c => c.trim()).filter(c => c.length > 0)))
}

/**
 * Parses the first JSON block in `text` that satisfies `schema`.
 * Throws ExtractionParseError when none does.
 */
export function parseJsonWith<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  for (const candidate of jsonCandidates(text)) {
    let value: unknown
    try {
      value = JSON.parse(candidate)
    } catch {
      continue
    }
    const result = schema.safeParse(value)
    if (result.success) return result.data
  }
  throw new ExtractionParseError('no JSON block matched the expected shape', text)
}
