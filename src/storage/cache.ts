import { LRUCache } from 'lru-cache'
import type { Memory } from '../memory/types.js'

/** Hot cache for per-user reads. Misses and failures fall back to the durable store. */
export interface MemoryCache {
  get(key: string): Promise<Memory[] | undefined>
  set(key: string, value: Memory[]): Promise<void>
  delete(key: string): Promise<void>
}

export function profileKey(userId: string): string {
  return `profile:${userId}`
}

export interface LruMemoryCacheOptions {
  ttlSeconds: number
  maxEntries: number
}

export class LruMemoryCache implements MemoryCache {
  private cache: LRUCache<string, Memory[]>

  constructor(options: LruMemoryCacheOptions) {
    this.cache = new LRUCache<string, Memory[]>({
      max: options.maxEntries,
      ttl: options.ttlSeconds * 1000
    })
  }

  async get(key: string): Promise<Memory[] | undefined> {
    return this.cache.get(key)
  }

  async set(key: string, value: Memory[]): Promise<void> {
    this.cache.set(key, value)
  }

  async delete(key: string): Promise<void> {
    this.cache.delete(key)
  }
}
