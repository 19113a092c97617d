import { describeError } from '../errors.js'
import { createLogger } from '../logger.js'

const log = createLogger('queue')

export type Job = () => Promise<void>

export interface WorkQueueOptions {
  concurrency: number
  /** Maximum number of jobs waiting to start. */
  capacity: number
  taskTimeoutMs: number
}

export interface WorkQueueStats {
  pending: number
  active: number
  completed: number
  failed: number
  timedOut: number
  rejected: number
}

interface QueuedJob {
  name: string
  run: Job
}

/**
 * FIFO background queue. Jobs run detached from whoever enqueued them; a job
 * past its timeout is abandoned (left to settle on its own) and counted.
 */
export class WorkQueue {
  private readonly options: WorkQueueOptions
  private readonly queue: QueuedJob[] = []
  private active = 0
  private closed = false
  private counters = { completed: 0, failed: 0, timedOut: 0, rejected: 0 }
  private idleWaiters: (() => void)[] = []

  constructor(options: WorkQueueOptions) {
    this.options = {
      concurrency: Math.max(1, Math.floor(options.concurrency)),
      capacity: Math.max(1, Math.floor(options.capacity)),
      taskTimeoutMs: options.taskTimeoutMs
    }
  }

  /**
   * Whether a job named `name` would be accepted right now. A refusal is
   * counted and logged as a rejection, so callers can check before doing
   * work they could not undo.
   */
  admits(name: string): boolean {
    if (this.closed) {
      this.counters.rejected++
      log.warn(`queue closed, rejecting ${name}`)
      return false
    }
    if (this.queue.length >= this.options.capacity) {
      this.counters.rejected++
      log.warn(`queue full (${this.options.capacity} pending), rejecting ${name}`)
      return false
    }
    return true
  }

  /** Returns false when the job was rejected (queue full or closed). */
  enqueue(name: string, run: Job): boolean {
    if (!this.admits(name)) return false
    this.queue.push({ name, run })
    this.drain()
    return true
  }

  stats(): WorkQueueStats {
    return {
      pending: this.queue.length,
      active: this.active,
      ...this.counters
    }
  }

  /** Resolves once nothing is pending or running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve()
    return new Promise(resolve => this.idleWaiters.push(resolve))
  }

  /** Stops accepting jobs and waits for the ones already accepted. */
  close(): Promise<void> {
    this.closed = true
    return this.onIdle()
  }

  private isIdle(): boolean {
    return this.active === 0 && this.queue.length === 0
  }

  private drain(): void {
    while (this.active < this.options.concurrency) {
      const next = this.queue.shift()
      if (!next) break
      this.active++
      void this.runJob(next)
    }

    if (this.isIdle()) {
      const waiters = this.idleWaiters
      this.idleWaiters = []
      for (const resolve of waiters) resolve()
    }
  }

  private async runJob(job: QueuedJob): Promise<void> {
    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => resolve('timeout'), this.options.taskTimeoutMs)
    })

    try {
      const running = job.run()
      const outcome = await Promise.race([running.then(() => 'done' as const), timeout])
      if (outcome === 'timeout') {
        this.counters.timedOut++
        log.error(`${job.name} timed out after ${this.options.taskTimeoutMs}ms, abandoned`)
        void running.catch(e => log.warn(`abandoned ${job.name} failed later: ${describeError(e)}`))
      } else {
        this.counters.completed++
      }
    } catch (e) {
      this.counters.failed++
      log.error(`${job.name} failed: ${describeError(e)}`)
    } finally {
      clearTimeout(timer)
      this.active--
      this.drain()
    }
  }
}
