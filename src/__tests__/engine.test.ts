import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { Mock } from 'vitest'
import { MemoryEngine } from '../engine.js'
import type { TurnInput } from '../engine.js'
import type { KeepsakeConfig } from '../config.js'
import type { CompletionFn } from '../providers/llm.js'
import { Database } from '../storage/database.js'
import { InMemoryVectorIndex } from '../storage/vector-index.js'
import type { SimilarityIndex } from '../storage/vector-index.js'
import { LruMemoryCache } from '../storage/cache.js'
import { FlakyIndex, KeywordEmbedder, extractionReply, manualClock, testConfig, verdictReply } from './fixtures.js'

function turn(turnNumber: number, userMessage = `message ${turnNumber}`): TurnInput {
  return {
    userId: 'user-1',
    conversationId: 'conv-1',
    turnNumber,
    userMessage,
    assistantMessage: 'Noted.'
  }
}

describe('MemoryEngine', () => {
  let db: Database
  let extractFn: Mock<CompletionFn>
  let classifyFn: Mock<CompletionFn>
  let clock: ReturnType<typeof manualClock>

  beforeEach(() => {
    db = new Database(':memory:')
    extractFn = vi.fn<CompletionFn>().mockResolvedValue('[]')
    classifyFn = vi.fn<CompletionFn>()
    clock = manualClock(new Date('2026-10-18T09:00:00Z'))
  })

  afterEach(() => {
    db.close()
  })

  function engine(config: KeepsakeConfig = testConfig(), index: SimilarityIndex = new InMemoryVectorIndex()): MemoryEngine {
    return new MemoryEngine({
      config,
      db,
      index,
      cache: new LruMemoryCache(config.cache),
      embedder: new KeywordEmbedder(),
      extractionFn: extractFn,
      classificationFn: classifyFn,
      now: clock.now
    })
  }

  describe('ingestTurn', () => {
    it('records the turn and returns before extraction finishes', async () => {
      extractFn.mockResolvedValue(extractionReply({ type: 'FACT', content: 'User works as a nurse' }))
      const e = engine()

      const receipt = e.ingestTurn(turn(1))

      expect(receipt).toEqual({ accepted: true, conversationId: 'conv-1', turnNumber: 1 })
      expect(db.getLastTurnNumber('conv-1')).toBe(1)
      expect(e.stats('user-1').total).toBe(0)

      await e.drain()
      expect(e.stats('user-1').active).toBe(1)
    })

    it('rejects malformed and out-of-order turns', () => {
      const e = engine()

      expect(e.ingestTurn({ ...turn(1), userId: '' })).toEqual({ accepted: false, reason: 'invalid_turn' })
      expect(e.ingestTurn(turn(-1))).toEqual({ accepted: false, reason: 'invalid_turn' })
      expect(e.ingestTurn(turn(2)).accepted).toBe(true)
      expect(e.ingestTurn(turn(2))).toEqual({ accepted: false, reason: 'out_of_order' })
      expect(e.ingestTurn(turn(1))).toEqual({ accepted: false, reason: 'out_of_order' })
    })

    it('reports an unavailable store', () => {
      const e = engine()
      db.close()

      expect(e.ingestTurn(turn(1))).toEqual({ accepted: false, reason: 'store_unavailable' })
      db = new Database(':memory:')
    })

    it('rejects turns when the background queue is full', async () => {
      const config = testConfig()
      config.worker = { concurrency: 1, capacity: 1, taskTimeoutMs: 1000 }
      let release: () => void = () => {}
      const blocked = new Promise<void>(resolve => {
        release = resolve
      })
      extractFn.mockImplementation(async () => {
        await blocked
        return '[]'
      })
      const e = engine(config)

      expect(e.ingestTurn(turn(1)).accepted).toBe(true)
      expect(e.ingestTurn(turn(2)).accepted).toBe(true)
      expect(e.ingestTurn(turn(3))).toEqual({ accepted: false, reason: 'queue_full' })

      release()
      await e.drain()
      expect(e.queueStats()).toMatchObject({ completed: 2, rejected: 1 })
    })

    it('accepts a resent turn once the queue has room again', async () => {
      const config = testConfig()
      config.worker = { concurrency: 1, capacity: 1, taskTimeoutMs: 1000 }
      let release: () => void = () => {}
      const blocked = new Promise<void>(resolve => {
        release = resolve
      })
      extractFn.mockImplementation(async () => {
        await blocked
        return '[]'
      })
      const e = engine(config)

      e.ingestTurn(turn(1))
      e.ingestTurn(turn(2))
      expect(e.ingestTurn(turn(3))).toEqual({ accepted: false, reason: 'queue_full' })

      release()
      await e.drain()

      expect(e.ingestTurn(turn(3))).toEqual({ accepted: true, conversationId: 'conv-1', turnNumber: 3 })
      await e.drain()
      expect(e.queueStats()).toMatchObject({ completed: 3, rejected: 1 })
    })
  })

  it('keeps a single memory when the same fact is mentioned three times', async () => {
    extractFn.mockResolvedValue(extractionReply({ type: 'PREFERENCE', content: 'User likes green tea' }))
    const e = engine()

    for (const n of [1, 2, 3]) e.ingestTurn(turn(n, 'I like green tea'))
    await e.drain()

    const stats = e.stats('user-1')
    expect(stats.total).toBe(1)
    expect(stats.active).toBe(1)
  })

  it('supersedes an old job once the classifier confirms the conflict', async () => {
    extractFn
      .mockResolvedValueOnce(extractionReply({ type: 'FACT', content: 'User works at Acme' }))
      .mockResolvedValueOnce(extractionReply({ type: 'FACT', content: 'User works at Globex' }))
    const e = engine()

    e.ingestTurn(turn(1))
    await e.drain()
    const [acme] = db.getActiveMemories('user-1')
    classifyFn.mockResolvedValue(verdictReply({ category: 'job', supersededId: acme.id }))

    clock.advanceDays(1)
    e.ingestTurn(turn(2))
    await e.drain()

    const active = db.getActiveMemories('user-1')
    expect(active.map(m => m.content)).toEqual(['User works at Globex'])
    expect(e.getMemory(acme.id)?.supersededBy).toBe(active[0].id)
  })

  it('fails open on classification and settles the conflict in the next sweep', async () => {
    extractFn
      .mockResolvedValueOnce(extractionReply({ type: 'FACT', content: 'User works at Acme' }))
      .mockResolvedValueOnce(extractionReply({ type: 'FACT', content: 'User works at Globex' }))
    classifyFn.mockRejectedValueOnce(new Error('classifier offline'))
    const e = engine()

    e.ingestTurn(turn(1))
    await e.drain()
    const [acme] = db.getActiveMemories('user-1')
    clock.advanceDays(1)
    e.ingestTurn(turn(2))
    await e.drain()

    expect(e.stats('user-1')).toMatchObject({ active: 2, deferredConflicts: 1 })

    classifyFn.mockResolvedValue(verdictReply({ category: 'job', supersededId: acme.id }))
    const report = await e.reconcile()

    expect(report).toMatchObject({ deferredResolved: 1, superseded: 1 })
    expect(e.stats('user-1')).toMatchObject({ active: 1, superseded: 1, deferredConflicts: 0 })
    expect(db.getActiveMemories('user-1')[0].content).toBe('User works at Globex')
  })

  it('indexes a memory in the sweep after the first upsert failed', async () => {
    extractFn.mockResolvedValue(extractionReply({ type: 'FACT', content: 'User owns a bicycle' }))
    const index = new FlakyIndex(1)
    const e = engine(testConfig(), index)

    e.ingestTurn(turn(1))
    await e.drain()
    const [memory] = db.getActiveMemories('user-1')
    expect(e.getMemory(memory.id)?.indexStatus).toBe('INDEX_PENDING')

    const report = await e.reconcile()

    expect(report.reindex).toEqual({ attempted: 1, indexed: 1, failed: 0 })
    expect(e.getMemory(memory.id)?.indexStatus).toBe('INDEXED')
    expect(index.inner.has(memory.id)).toBe(true)
  })

  it('tracks access for retrieved memories', async () => {
    extractFn.mockResolvedValue(extractionReply({ type: 'FACT', content: 'User works as a nurse' }))
    const e = engine()
    e.ingestTurn(turn(1))
    await e.drain()

    clock.advanceDays(2)
    const ranked = await e.retrieve('user-1', 'What is my job?')
    await e.drain()

    expect(ranked.map(r => r.memory.content)).toEqual(['User works as a nurse'])
    const stored = e.getMemory(ranked[0].memory.id)
    expect(stored?.accessCount).toBe(1)
    expect(stored?.lastAccessed.toISOString()).toBe('2026-10-20T09:00:00.000Z')
  })

  it('greets with the user profile', async () => {
    extractFn.mockResolvedValue(extractionReply(
      { type: 'FACT', content: "User's name is Sam", importance: 'MEDIUM' },
      { type: 'PREFERENCE', content: 'User likes green tea' }
    ))
    const e = engine()
    e.ingestTurn(turn(1))
    await e.drain()

    const ranked = await e.retrieve('user-1', 'Hello!', { turnNumber: 1 })

    expect(ranked.map(r => [r.memory.content, r.memory.importanceLevel])).toEqual([["User's name is Sam", 'CRITICAL']])
    expect(ranked[0].intent).toBe('GREETING')
  })

  it('stops accepting turns once closed', async () => {
    const e = engine()
    await e.close()

    expect(e.ingestTurn(turn(1))).toEqual({ accepted: false, reason: 'queue_full' })
  })
})
