import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import { parseJsonWith, scanBalancedJson, stripCodeFences } from '../json-extract.js'
import { ExtractionParseError } from '../../errors.js'

describe('JSON extraction', () => {
  it('strips markdown code fences', () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}')
  })

  it('finds balanced blocks and ignores brackets inside strings', () => {
    expect(scanBalancedJson('x {"a":"}"} y [1,[2]]')).toEqual(['{"a":"}"}', '[1,[2]]'])
  })

  it('returns the first block that matches the schema', () => {
    const schema = z.object({ a: z.number() })
    expect(parseJsonWith('Example: {"b":2} Answer: {"a":1}', schema)).toEqual({ a: 1 })
  })

  it('throws ExtractionParseError when nothing matches', () => {
    expect(() => parseJsonWith('I cannot help with that', z.array(z.unknown()))).toThrow(ExtractionParseError)
  })
})
