import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { hydrateIndex } from '../hydrator.js'
import { Database } from '../../storage/database.js'
import { InMemoryVectorIndex } from '../../storage/vector-index.js'
import { makeMemory } from '../../__tests__/fixtures.js'

describe('hydrateIndex', () => {
  let db: Database

  beforeEach(() => {
    db = new Database(':memory:')
  })

  afterEach(() => {
    db.close()
  })

  it('loads only active, indexed memories', async () => {
    const indexed = makeMemory({ content: 'User likes tea', embedding: [1, 0] })
    const pending = makeMemory({ content: 'User likes coffee', indexStatus: 'INDEX_PENDING' })
    const replaced = makeMemory({ content: 'User lives in Oslo' })
    const replacement = makeMemory({ content: 'User lives in Bergen' })
    for (const m of [indexed, pending, replaced, replacement]) db.insertMemory(m)
    db.supersede(replaced.id, replacement.id)

    const index = new InMemoryVectorIndex()
    const loaded = await hydrateIndex(db, index)

    expect(loaded).toBe(2)
    expect(index.has(indexed.id)).toBe(true)
    expect(index.has(replacement.id)).toBe(true)
    expect(index.has(pending.id)).toBe(false)
    expect(index.has(replaced.id)).toBe(false)
  })

  it('makes hydrated memories searchable per user', async () => {
    db.insertMemory(makeMemory({ id: 'a', userId: 'user-1', content: 'User likes tea', embedding: [1, 0] }))
    db.insertMemory(makeMemory({ id: 'b', userId: 'user-2', content: 'User likes tea', embedding: [1, 0] }))

    const index = new InMemoryVectorIndex()
    await hydrateIndex(db, index)

    const matches = await index.query([1, 0], { userId: 'user-2' }, 10)
    expect(matches).toEqual([{ id: 'b', similarity: 1 }])
  })
})
