export class ExtractionParseError extends Error {
  readonly raw: string

  constructor(message: string, raw: string) {
    super(message)
    this.name = 'ExtractionParseError'
    this.raw = raw.slice(0, 500)
  }
}

export type ServiceName = 'embedder' | 'llm' | 'index' | 'store' | 'cache'

export class ExternalServiceUnavailable extends Error {
  readonly service: ServiceName

  constructor(service: ServiceName, cause: unknown) {
    super(`${service} unavailable: ${describeError(cause)}`, { cause })
    this.name = 'ExternalServiceUnavailable'
    this.service = service
  }
}

/** Raised when an insert loses the (user_id, content_hash) race. Callers treat it as success. */
export class DuplicateConstraintViolation extends Error {
  readonly userId: string
  readonly contentHash: string

  constructor(userId: string, contentHash: string) {
    super(`memory with hash ${contentHash.slice(0, 12)} already active for user ${userId}`)
    this.name = 'DuplicateConstraintViolation'
    this.userId = userId
    this.contentHash = contentHash
  }
}

export class IndexInconsistency extends Error {
  readonly memoryId: string

  constructor(memoryId: string, detail: string) {
    super(`memory ${memoryId}: ${detail}`)
    this.name = 'IndexInconsistency'
    this.memoryId = memoryId
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}

export interface RetryOptions {
  attempts: number
  baseDelayMs: number
  maxDelayMs: number
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Runs `fn` up to `attempts` times, doubling the delay between tries
 * (capped at `maxDelayMs`). The last failure is rethrown as
 * ExternalServiceUnavailable for `service`.
 */
export async function withRetry<T>(
  service: ServiceName,
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts))
  let lastError: unknown = null

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn()
    } catch (err) {
      lastError = err
      if (attempt < attempts - 1) {
        const delay = Math.min(options.maxDelayMs, options.baseDelayMs * 2 ** attempt)
        if (delay > 0) await sleep(delay)
      }
    }
  }

  throw new ExternalServiceUnavailable(service, lastError)
}

/** Rejects with ExternalServiceUnavailable when `promise` does not settle within `ms`. */
export async function withTimeout<T>(service: ServiceName, promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | null = null
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ExternalServiceUnavailable(service, new Error(`timed out after ${ms}ms`))), ms)
  })
  try {
    return await Promise.race([promise, timeout])
  } finally {
    if (timer) clearTimeout(timer)
  }
}
