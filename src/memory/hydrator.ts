import type { Database } from '../storage/database.js'
import type { SimilarityIndex } from '../storage/vector-index.js'

/** Loads every active INDEXED memory into `index`. Returns the number loaded. */
export async function hydrateIndex(db: Database, index: SimilarityIndex): Promise<number> {
  const memories = db.getIndexedMemories()

  for (const memory of memories) {
    await index.upsert(memory.id, memory.embedding, { userId: memory.userId, type: memory.type })
  }

  return memories.length
}
