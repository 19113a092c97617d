import BetterSqlite3 from 'better-sqlite3'
import { z } from 'zod'
import { DuplicateConstraintViolation } from '../errors.js'
import {
  CONFLICT_CHECKS,
  IMPORTANCE_LEVELS,
  INDEX_STATUSES,
  MEMORY_TYPES,
  dueAtOf,
  toVariant
} from '../memory/types.js'
import type {
  ConflictCheck,
  ConversationTurn,
  IndexStatus,
  Memory,
  MemoryType
} from '../memory/types.js'

interface MemoryRow {
  id: string
  user_id: string
  type: string
  content: string
  embedding: string
  confidence: number
  importance_level: string
  importance_score: number
  tags: string
  entities: string
  content_hash: string
  source_turn: number
  conversation_id: string
  created_at: string
  last_accessed: string
  access_count: number
  index_status: string
  index_attempts: number
  conflict_check: string
  superseded_by: string | null
  due_at: string | null
}

interface TurnRow {
  conversation_id: string
  user_id: string
  turn_number: number
  user_message: string
  assistant_message: string
  created_at: string
}

export interface MemoryStats {
  userId: string
  total: number
  active: number
  superseded: number
  byType: Partial<Record<MemoryType, number>>
  byIndexStatus: Partial<Record<IndexStatus, number>>
  totalAccessCount: number
  deferredConflicts: number
}

const MemoryTypeSchema = z.enum(MEMORY_TYPES)
const ImportanceLevelSchema = z.enum(IMPORTANCE_LEVELS)
const IndexStatusSchema = z.enum(INDEX_STATUSES)
const ConflictCheckSchema = z.enum(CONFLICT_CHECKS)
const EmbeddingSchema = z.array(z.number())
const StringListSchema = z.array(z.string())

const MEMORY_COLUMNS = `id, user_id, type, content, embedding, confidence, importance_level, importance_score,
  tags, entities, content_hash, source_turn, conversation_id, created_at, last_accessed, access_count,
  index_status, index_attempts, conflict_check, superseded_by, due_at`

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'SQLITE_CONSTRAINT_UNIQUE'
}

export class Database {
  private db: BetterSqlite3.Database

  constructor(dbPath: string) {
    this.db = new BetterSqlite3(dbPath)
    this.db.pragma('journal_mode = WAL')
    this.db.pragma('foreign_keys = ON')
    this.createTables()
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS memories (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        type TEXT NOT NULL,
        content TEXT NOT NULL,
        embedding JSON NOT NULL,
        confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
        importance_level TEXT NOT NULL,
        importance_score REAL NOT NULL CHECK (importance_score >= 0 AND importance_score <= 1),
        tags JSON NOT NULL,
        entities JSON NOT NULL,
        content_hash TEXT NOT NULL,
        source_turn INTEGER NOT NULL,
        conversation_id TEXT NOT NULL,
        created_at DATETIME NOT NULL,
        last_accessed DATETIME NOT NULL,
        access_count INTEGER NOT NULL DEFAULT 0,
        index_status TEXT NOT NULL DEFAULT 'CREATED',
        index_attempts INTEGER NOT NULL DEFAULT 0,
        conflict_check TEXT NOT NULL DEFAULT 'NOT_APPLICABLE',
        superseded_by TEXT REFERENCES memories(id),
        due_at DATETIME
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_memories_active_hash
        ON memories (user_id, content_hash) WHERE superseded_by IS NULL;

      CREATE INDEX IF NOT EXISTS idx_memories_user_created
        ON memories (user_id, created_at DESC);

      CREATE INDEX IF NOT EXISTS idx_memories_index_status
        ON memories (index_status);

      CREATE TABLE IF NOT EXISTS conversation_turns (
        conversation_id TEXT NOT NULL,
        user_id TEXT NOT NULL,
        turn_number INTEGER NOT NULL,
        user_message TEXT NOT NULL,
        assistant_message TEXT NOT NULL,
        created_at DATETIME NOT NULL,
        PRIMARY KEY (conversation_id, turn_number)
      );
    `)
  }

  listTables(): string[] {
    const rows = this.db.prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'"
    ).all()
    return rows.map(r => r.name)
  }

  ping(): void {
    this.db.prepare('SELECT 1').get()
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)()
  }

  // --- Memories ---

  /** Throws DuplicateConstraintViolation when an active memory with the same hash exists. */
  insertMemory(memory: Memory): void {
    try {
      this.db.prepare(`
        INSERT INTO memories (${MEMORY_COLUMNS})
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        memory.id,
        memory.userId,
        memory.type,
        memory.content,
        JSON.stringify(memory.embedding),
        memory.confidence,
        memory.importanceLevel,
        memory.importanceScore,
        JSON.stringify(memory.tags),
        JSON.stringify(memory.entities),
        memory.contentHash,
        memory.sourceTurn,
        memory.conversationId,
        memory.createdAt.toISOString(),
        memory.lastAccessed.toISOString(),
        memory.accessCount,
        memory.indexStatus,
        memory.indexAttempts,
        memory.conflictCheck,
        memory.supersededBy,
        dueAtOf(memory)?.toISOString() ?? null
      )
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new DuplicateConstraintViolation(memory.userId, memory.contentHash)
      }
      throw err
    }
  }

  getMemory(id: string): Memory | null {
    const row = this.db.prepare<[string], MemoryRow>(
      `SELECT ${MEMORY_COLUMNS} FROM memories WHERE id = ?`
    ).get(id)
    return row ? this.deserializeMemory(row) : null
  }

  getMemoriesByIds(ids: string[]): Memory[] {
    if (ids.length === 0) return []
    const placeholders = ids.map(() => '?').join(', ')
    const rows = this.db.prepare<string[], MemoryRow>(
      `SELECT ${MEMORY_COLUMNS} FROM memories WHERE id IN (${placeholders})`
    ).all(...ids)
    return rows.map(row => this.deserializeMemory(row))
  }

  /** Newest first; superseded rows excluded. */
  getRecentMemories(userId: string, options: { limit: number; type?: MemoryType }): Memory[] {
    let sql = `SELECT ${MEMORY_COLUMNS} FROM memories WHERE user_id = ? AND superseded_by IS NULL`
    const params: (string | number)[] = [userId]
    if (options.type) {
      sql += ' AND type = ?'
      params.push(options.type)
    }
    sql += ' ORDER BY created_at DESC, id ASC LIMIT ?'
    params.push(options.limit)

    const rows = this.db.prepare<(string | number)[], MemoryRow>(sql).all(...params)
    return rows.map(row => this.deserializeMemory(row))
  }

  getActiveMemories(userId: string): Memory[] {
    const rows = this.db.prepare<[string], MemoryRow>(
      `SELECT ${MEMORY_COLUMNS} FROM memories WHERE user_id = ? AND superseded_by IS NULL ORDER BY created_at ASC, id ASC`
    ).all(userId)
    return rows.map(row => this.deserializeMemory(row))
  }

  /** Active CRITICAL/HIGH memories by importance, then newest, then id. */
  getProfileMemories(userId: string): Memory[] {
    const rows = this.db.prepare<[string], MemoryRow>(`
      SELECT ${MEMORY_COLUMNS} FROM memories
      WHERE user_id = ? AND superseded_by IS NULL AND importance_level IN ('CRITICAL', 'HIGH')
      ORDER BY importance_score DESC, created_at DESC, id ASC
    `).all(userId)
    return rows.map(row => this.deserializeMemory(row))
  }

  findActiveByHash(userId: string, hash: string): Memory | null {
    const row = this.db.prepare<[string, string], MemoryRow>(
      `SELECT ${MEMORY_COLUMNS} FROM memories WHERE user_id = ? AND content_hash = ? AND superseded_by IS NULL`
    ).get(userId, hash)
    return row ? this.deserializeMemory(row) : null
  }

  /** Increments access_count; last_accessed never moves backwards. */
  recordAccess(ids: string[], at: Date): void {
    const stmt = this.db.prepare<[string, string, string]>(`
      UPDATE memories
      SET access_count = access_count + 1,
          last_accessed = CASE WHEN last_accessed > ? THEN last_accessed ELSE ? END
      WHERE id = ?
    `)
    const iso = at.toISOString()
    this.transaction(() => {
      for (const id of ids) stmt.run(iso, iso, id)
    })
  }

  /** Returns false when `oldId` is missing or already superseded. */
  supersede(oldId: string, newId: string): boolean {
    const result = this.db.prepare<[string, string]>(
      'UPDATE memories SET superseded_by = ?, importance_score = 0 WHERE id = ? AND superseded_by IS NULL'
    ).run(newId, oldId)
    return result.changes > 0
  }

  updateIndexStatus(id: string, status: IndexStatus, attempts: number): void {
    this.db.prepare<[string, number, string]>(
      'UPDATE memories SET index_status = ?, index_attempts = ? WHERE id = ?'
    ).run(status, attempts, id)
  }

  getMemoriesByIndexStatus(statuses: IndexStatus[], limit: number): Memory[] {
    if (statuses.length === 0) return []
    const placeholders = statuses.map(() => '?').join(', ')
    const rows = this.db.prepare<(string | number)[], MemoryRow>(`
      SELECT ${MEMORY_COLUMNS} FROM memories
      WHERE index_status IN (${placeholders}) AND superseded_by IS NULL
      ORDER BY created_at ASC, id ASC LIMIT ?
    `).all(...statuses, limit)
    return rows.map(row => this.deserializeMemory(row))
  }

  /** Every active, indexed memory; used to rebuild an in-process index at startup. */
  getIndexedMemories(): Memory[] {
    const rows = this.db.prepare<[], MemoryRow>(
      `SELECT ${MEMORY_COLUMNS} FROM memories WHERE index_status = 'INDEXED' AND superseded_by IS NULL`
    ).all()
    return rows.map(row => this.deserializeMemory(row))
  }

  setConflictCheck(id: string, check: ConflictCheck): void {
    this.db.prepare<[string, string]>('UPDATE memories SET conflict_check = ? WHERE id = ?').run(check, id)
  }

  getDeferredConflicts(limit: number): Memory[] {
    const rows = this.db.prepare<[number], MemoryRow>(`
      SELECT ${MEMORY_COLUMNS} FROM memories
      WHERE conflict_check = 'DEFERRED'
      ORDER BY created_at ASC, id ASC LIMIT ?
    `).all(limit)
    return rows.map(row => this.deserializeMemory(row))
  }

  listUserIds(): string[] {
    const rows = this.db.prepare<[], { user_id: string }>(
      'SELECT DISTINCT user_id FROM memories ORDER BY user_id'
    ).all()
    return rows.map(r => r.user_id)
  }

  getStats(userId: string): MemoryStats {
    const rows = this.db.prepare<[string], {
      type: string
      index_status: string
      conflict_check: string
      superseded: number
      count: number
      accesses: number
    }>(`
      SELECT type, index_status, conflict_check,
             (superseded_by IS NOT NULL) AS superseded,
             COUNT(*) AS count, SUM(access_count) AS accesses
      FROM memories WHERE user_id = ?
      GROUP BY type, index_status, conflict_check, superseded
    `).all(userId)

    const stats: MemoryStats = {
      userId,
      total: 0,
      active: 0,
      superseded: 0,
      byType: {},
      byIndexStatus: {},
      totalAccessCount: 0,
      deferredConflicts: 0
    }
    for (const row of rows) {
      const type = MemoryTypeSchema.parse(row.type)
      const status = IndexStatusSchema.parse(row.index_status)
      stats.total += row.count
      stats.totalAccessCount += row.accesses
      if (row.superseded) stats.superseded += row.count
      else stats.active += row.count
      if (row.conflict_check === 'DEFERRED') stats.deferredConflicts += row.count
      stats.byType[type] = (stats.byType[type] ?? 0) + row.count
      stats.byIndexStatus[status] = (stats.byIndexStatus[status] ?? 0) + row.count
    }
    return stats
  }

  private deserializeMemory(row: MemoryRow): Memory {
    const type = MemoryTypeSchema.parse(row.type)
    return {
      ...toVariant(type, row.due_at ? new Date(row.due_at) : null),
      id: row.id,
      userId: row.user_id,
      content: row.content,
      embedding: EmbeddingSchema.parse(JSON.parse(row.embedding)),
      confidence: row.confidence,
      importanceLevel: ImportanceLevelSchema.parse(row.importance_level),
      importanceScore: row.importance_score,
      tags: StringListSchema.parse(JSON.parse(row.tags)),
      entities: StringListSchema.parse(JSON.parse(row.entities)),
      contentHash: row.content_hash,
      sourceTurn: row.source_turn,
      conversationId: row.conversation_id,
      createdAt: new Date(row.created_at),
      lastAccessed: new Date(row.last_accessed),
      accessCount: row.access_count,
      indexStatus: IndexStatusSchema.parse(row.index_status),
      indexAttempts: row.index_attempts,
      conflictCheck: ConflictCheckSchema.parse(row.conflict_check),
      supersededBy: row.superseded_by
    }
  }

  // --- Conversation Turns ---

  getLastTurnNumber(conversationId: string): number | null {
    const row = this.db.prepare<[string], { last: number | null }>(
      'SELECT MAX(turn_number) AS last FROM conversation_turns WHERE conversation_id = ?'
    ).get(conversationId)
    return row?.last ?? null
  }

  /**
   * Appends a turn. Returns false (and writes nothing) when `turnNumber` is not
   * greater than the conversation's last recorded turn.
   */
  insertTurn(turn: ConversationTurn): boolean {
    return this.transaction(() => {
      const last = this.getLastTurnNumber(turn.conversationId)
      if (last !== null && turn.turnNumber <= last) return false
      this.db.prepare(`
        INSERT INTO conversation_turns (conversation_id, user_id, turn_number, user_message, assistant_message, created_at)
        VALUES (?, ?, ?, ?, ?, ?)
      `).run(
        turn.conversationId,
        turn.userId,
        turn.turnNumber,
        turn.userMessage,
        turn.assistantMessage,
        turn.createdAt.toISOString()
      )
      return true
    })
  }

  /** Up to `limit` turns preceding `turnNumber`, oldest first. */
  getTurnsBefore(conversationId: string, turnNumber: number, limit: number): ConversationTurn[] {
    const rows = this.db.prepare<[string, number, number], TurnRow>(`
      SELECT * FROM conversation_turns
      WHERE conversation_id = ? AND turn_number < ?
      ORDER BY turn_number DESC LIMIT ?
    `).all(conversationId, turnNumber, limit)
    return rows.reverse().map(row => ({
      conversationId: row.conversation_id,
      userId: row.user_id,
      turnNumber: row.turn_number,
      userMessage: row.user_message,
      assistantMessage: row.assistant_message,
      createdAt: new Date(row.created_at)
    }))
  }

  // --- Lifecycle ---

  close(): void {
    this.db.close()
  }
}
