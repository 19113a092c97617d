import { describe, it, expect } from 'vitest'
import { classifyIntent, isFiller, isGreetingPhrase } from '../intent.js'

describe('Intent classification', () => {
  it('treats an opening greeting as GREETING', () => {
    expect(classifyIntent('hi')).toBe('GREETING')
    expect(classifyIntent('Hello there!', { turnNumber: 1 })).toBe('GREETING')
    expect(classifyIntent('good morning', { turnNumber: 2 })).toBe('GREETING')
  })

  it('downgrades a greeting late in the conversation to BROAD', () => {
    expect(classifyIntent('hi', { turnNumber: 3 })).toBe('BROAD')
    expect(classifyIntent('hey', { turnNumber: 40 })).toBe('BROAD')
  })

  it('honours a custom greeting window', () => {
    expect(classifyIntent('hi', { turnNumber: 5 }, 5)).toBe('GREETING')
  })

  it('classifies acknowledgements and fillers as BROAD', () => {
    expect(classifyIntent('ok')).toBe('BROAD')
    expect(classifyIntent('Thanks!')).toBe('BROAD')
    expect(classifyIntent('tell me more')).toBe('BROAD')
    expect(classifyIntent('   ')).toBe('BROAD')
  })

  it('classifies concrete questions as SPECIFIC', () => {
    expect(classifyIntent('What wall paint should I choose?')).toBe('SPECIFIC')
    expect(classifyIntent('history of the roman empire')).toBe('SPECIFIC')
  })

  it('does not treat a long message that opens with a greeting as one', () => {
    expect(isGreetingPhrase('hey, what wall paint should I choose?')).toBe(false)
    expect(classifyIntent('hey, what wall paint should I choose?', { turnNumber: 1 })).toBe('SPECIFIC')
  })

  it('treats a short question that opens with a greeting as SPECIFIC at any turn', () => {
    expect(isGreetingPhrase('hey, where do I work?')).toBe(false)
    expect(classifyIntent('hey, where do I work?')).toBe('SPECIFIC')
    expect(classifyIntent('hey, where do I work?', { turnNumber: 10 })).toBe('SPECIFIC')
    expect(classifyIntent('hi, my name?', { turnNumber: 1 })).toBe('SPECIFIC')
  })

  it('allows a bare addressee after the greeting', () => {
    expect(isGreetingPhrase('hi there')).toBe(true)
    expect(isGreetingPhrase('Hey again!')).toBe(true)
    expect(classifyIntent('hello everyone', { turnNumber: 12 })).toBe('BROAD')
  })

  it('lets an explicit hint win', () => {
    expect(classifyIntent('hi', { intent: 'SPECIFIC' })).toBe('SPECIFIC')
    expect(classifyIntent('What is my name?', { intent: 'GREETING' })).toBe('GREETING')
  })

  it('recognises fillers with trailing question marks', () => {
    expect(isFiller('really??')).toBe(true)
    expect(isFiller('really, what happened')).toBe(false)
  })
})
