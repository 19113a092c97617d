import { z } from 'zod'
import { loadConfig, saveConfig } from '../config.js'
import { formatMemoryContext } from '../memory/context.js'
import type { QueryIntent, RankedMemory } from '../memory/types.js'
import { dueAtOf } from '../memory/types.js'
import { KeepsakeRuntime } from '../runtime.js'

const IntentSchema = z.enum(['GREETING', 'BROAD', 'SPECIFIC'])

async function withRuntime<T>(fn: (runtime: KeepsakeRuntime) => Promise<T>): Promise<T> {
  const runtime = new KeepsakeRuntime()
  await runtime.wake({ schedule: false })
  try {
    return await fn(runtime)
  } finally {
    await runtime.sleep()
  }
}

function parseTurnNumber(raw: string): number {
  const turn = Number(raw)
  if (!Number.isInteger(turn) || turn < 0) {
    throw new Error(`Invalid turn number: ${raw}`)
  }
  return turn
}

export interface IngestOptions {
  user: string
  conversation: string
  turn: string
  userMessage: string
  assistantMessage: string
}

export async function ingestCommand(options: IngestOptions): Promise<void> {
  await withRuntime(async (runtime) => {
    const receipt = runtime.engine.ingestTurn({
      userId: options.user,
      conversationId: options.conversation,
      turnNumber: parseTurnNumber(options.turn),
      userMessage: options.userMessage,
      assistantMessage: options.assistantMessage
    })

    if (!receipt.accepted) {
      console.log(`Turn not accepted: ${receipt.reason}`)
      return
    }

    await runtime.engine.drain()
    const stats = runtime.engine.stats(options.user)
    console.log(`Turn ${receipt.turnNumber} ingested. ${stats.active} active memories for ${options.user}.`)
  })
}

export interface RecallOptions {
  user: string
  turn?: string
  intent?: string
  context?: boolean
}

function printRanked(ranked: RankedMemory[]): void {
  console.log(`\n  ${ranked.length} memor${ranked.length === 1 ? 'y' : 'ies'} (intent: ${ranked[0]?.intent ?? 'n/a'}):\n`)
  for (const r of ranked) {
    const b = r.breakdown
    console.log(`  [${r.memory.id}] ${r.memory.type} ${r.score.toFixed(3)}`)
    console.log(`    ${r.memory.content}`)
    console.log(
      `    sim ${b.similarity.toFixed(2)}  imp ${b.importance.toFixed(2)}  rec ${b.recency.toFixed(2)}  ` +
      `freq ${b.accessFrequency.toFixed(2)}  conf ${b.confidence.toFixed(2)}`
    )
  }
  console.log('')
}

export async function recallCommand(query: string, options: RecallOptions): Promise<void> {
  let intent: QueryIntent | undefined
  if (options.intent) {
    const parsed = IntentSchema.safeParse(options.intent.toUpperCase())
    if (!parsed.success) {
      console.log(`Unknown intent: ${options.intent} (expected GREETING, BROAD or SPECIFIC)`)
      return
    }
    intent = parsed.data
  }

  await withRuntime(async (runtime) => {
    const ranked = await runtime.engine.retrieve(options.user, query, {
      intent,
      turnNumber: options.turn === undefined ? undefined : parseTurnNumber(options.turn)
    })

    if (ranked.length === 0) {
      console.log('No memories surfaced.')
      return
    }

    if (options.context) {
      console.log(formatMemoryContext(ranked))
    } else {
      printRanked(ranked)
    }
  })
}

export async function sweepCommand(): Promise<void> {
  await withRuntime(async (runtime) => {
    const report = await runtime.engine.reconcile()
    console.log('')
    console.log('  Reconciliation Sweep')
    console.log('  --------------------')
    console.log(`  Reindexed:          ${report.reindex.indexed}/${report.reindex.attempted}`)
    console.log(`  Deferred settled:   ${report.deferredResolved} (${report.deferredRemaining} still deferred)`)
    console.log(`  Superseded:         ${report.superseded}`)
    console.log(`  Consolidated:       ${report.consolidated}`)
    console.log('')
  })
}

export async function statsCommand(options: { user: string }): Promise<void> {
  await withRuntime(async (runtime) => {
    const stats = runtime.engine.stats(options.user)
    console.log('')
    console.log(`  Memory Stats for ${stats.userId}`)
    console.log('  ' + '-'.repeat(20 + stats.userId.length))
    console.log(`  Total:              ${stats.total}`)
    console.log(`  Active:             ${stats.active}`)
    console.log(`  Superseded:         ${stats.superseded}`)
    console.log(`  Total accesses:     ${stats.totalAccessCount}`)
    console.log(`  Deferred conflicts: ${stats.deferredConflicts}`)
    for (const [type, count] of Object.entries(stats.byType)) {
      console.log(`  ${type.padEnd(20)}${count}`)
    }
    for (const [status, count] of Object.entries(stats.byIndexStatus)) {
      console.log(`  ${status.padEnd(20)}${count}`)
    }
    console.log('')
  })
}

export async function showCommand(id: string): Promise<void> {
  await withRuntime(async (runtime) => {
    const memory = runtime.engine.getMemory(id)
    if (!memory) {
      console.log(`Memory not found: ${id}`)
      return
    }

    const dueAt = dueAtOf(memory)
    console.log('')
    console.log(`  Memory: ${memory.id}`)
    console.log('  ' + '-'.repeat(40))
    console.log(`  User:         ${memory.userId}`)
    console.log(`  Type:         ${memory.type}`)
    console.log(`  Content:      ${memory.content}`)
    console.log(`  Importance:   ${memory.importanceLevel} (${memory.importanceScore.toFixed(2)})`)
    console.log(`  Confidence:   ${memory.confidence.toFixed(2)}`)
    if (dueAt) console.log(`  Due:          ${dueAt.toISOString()}`)
    console.log(`  Tags:         ${memory.tags.join(', ') || '-'}`)
    console.log(`  Entities:     ${memory.entities.join(', ') || '-'}`)
    console.log(`  Source:       ${memory.conversationId}#${memory.sourceTurn}`)
    console.log(`  Created:      ${memory.createdAt.toISOString()}`)
    console.log(`  Accessed:     ${memory.accessCount} times, last ${memory.lastAccessed.toISOString()}`)
    console.log(`  Index:        ${memory.indexStatus} (${memory.indexAttempts} attempts)`)
    console.log(`  Conflicts:    ${memory.conflictCheck}`)
    if (memory.supersededBy) console.log(`  Superseded by ${memory.supersededBy}`)
    console.log('')
  })
}

/** Turns `a.b.c` and a value into `{ a: { b: { c: value } } }`. */
export function buildConfigPatch(key: string, raw: string): Record<string, unknown> {
  let value: unknown
  // Numbers and booleans arrive as JSON
  try {
    value = JSON.parse(raw)
  } catch {
    value = raw
  }

  const parts = key.split('.').filter(p => p.length > 0)
  return parts.reduceRight<Record<string, unknown>>((inner, part, i) => {
    return { [part]: i === parts.length - 1 ? value : inner }
  }, {})
}

export async function configCommand(action?: string, key?: string, value?: string): Promise<void> {
  if (!action) {
    const config = loadConfig()
    console.log(JSON.stringify({ ...config, llm: { ...config.llm, apiKey: config.llm.apiKey ? '(set)' : undefined } }, null, 2))
    return
  }

  if (action === 'set' && key && value !== undefined) {
    saveConfig(buildConfigPatch(key, value))
    console.log(`Set ${key} = ${value}`)
    return
  }

  console.log('Usage: keepsake config [set <key> <value>]')
}
