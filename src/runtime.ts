import { mkdirSync } from 'node:fs'
import path from 'node:path'
import { loadConfig, resolveDbPath, validateConfig } from './config.js'
import type { KeepsakeConfig } from './config.js'
import { MemoryEngine } from './engine.js'
import { describeError } from './errors.js'
import { createLogger } from './logger.js'
import { hydrateIndex } from './memory/hydrator.js'
import { createVoyageEmbedder } from './providers/embeddings.js'
import type { Embedder } from './providers/embeddings.js'
import { createCompletionFn } from './providers/llm.js'
import type { CompletionFn } from './providers/llm.js'
import { LruMemoryCache } from './storage/cache.js'
import { Database } from './storage/database.js'
import { InMemoryVectorIndex } from './storage/vector-index.js'

const log = createLogger('startup')

export interface WakeOptions {
  /** Merged over the config file. */
  overrides?: unknown
  embedder?: Embedder
  completeFn?: CompletionFn
  /** Skip the scheduled sweep, for one-shot CLI commands. */
  schedule?: boolean
}

interface AwakeState {
  config: KeepsakeConfig
  db: Database
  index: InMemoryVectorIndex
  engine: MemoryEngine
}

export class KeepsakeRuntime {
  private state: AwakeState | null = null
  private sweepTimer: NodeJS.Timeout | null = null

  get config(): KeepsakeConfig {
    return this.awake().config
  }

  get db(): Database {
    return this.awake().db
  }

  get index(): InMemoryVectorIndex {
    return this.awake().index
  }

  get engine(): MemoryEngine {
    return this.awake().engine
  }

  get isAwake(): boolean {
    return this.state !== null
  }

  async wake(options: WakeOptions = {}): Promise<void> {
    if (this.state) return

    // 1. Load config
    const config = loadConfig(options.overrides)

    // 1b. Validate; API keys only matter when real providers are used
    const configErrors = validateConfig(config, {
      requireApiKeys: !options.embedder || !options.completeFn
    })
    if (configErrors.length > 0) {
      const details = configErrors.map(e => `${e.field}: ${e.message}`).join('\n')
      throw new Error(`Invalid configuration:\n${details}`)
    }

    // 2. Open database; nothing works without it
    const dbPath = resolveDbPath(config)
    if (dbPath !== ':memory:') mkdirSync(path.dirname(dbPath), { recursive: true })
    const db = new Database(dbPath)

    // 3. Rebuild the similarity index from indexed rows
    const index = new InMemoryVectorIndex()
    const loaded = await hydrateIndex(db, index)
    log.info(`Loaded ${loaded} indexed memories from ${dbPath}`)

    // 4. Wire providers and the engine
    const engine = new MemoryEngine({
      config,
      db,
      index,
      cache: new LruMemoryCache(config.cache),
      embedder: options.embedder ?? createVoyageEmbedder(config.llm.embeddingModel),
      extractionFn: options.completeFn ?? createCompletionFn(config.llm, config.llm.extractionModel),
      classificationFn: options.completeFn ?? createCompletionFn(config.llm, config.llm.classificationModel)
    })
    this.state = { config, db, index, engine }

    // 5. Schedule reconciliation
    if (options.schedule ?? true) this.scheduleSweep(engine, config.reconciliation.intervalMinutes)
  }

  async sleep(): Promise<void> {
    const state = this.state
    if (!state) return

    // 1. Stop the sweep timer
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer)
      this.sweepTimer = null
    }

    // 2. Let accepted work finish
    await state.engine.close()

    // 3. Final sweep
    try {
      await state.engine.reconcile()
    } catch (e) {
      log.error(`Final sweep failed: ${describeError(e)}`)
    }

    // 4. Close database
    state.db.close()
    this.state = null
  }

  private awake(): AwakeState {
    if (!this.state) throw new Error('Runtime is asleep; call wake() first')
    return this.state
  }

  private scheduleSweep(engine: MemoryEngine, intervalMinutes: number): void {
    this.sweepTimer = setInterval(() => {
      engine.reconcile().catch(e => {
        log.error(`Scheduled sweep failed: ${describeError(e)}`)
      })
    }, intervalMinutes * 60 * 1000)
    this.sweepTimer.unref()
  }
}
