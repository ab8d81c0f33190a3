import Database from 'better-sqlite3'
import { mkdirSync } from 'fs'
import { dirname, join } from 'path'
import { z } from 'zod'
import type { Config } from '../core/config.js'
import { StorageError } from '../core/errors.js'
import type { EventQuery } from '../core/events.js'
import { createEvent, eventDetail, parsePayload } from '../core/events.js'
import type { EventPayload, MemoryEvent, SessionInfo } from '../core/types.js'
import { logger } from '../utils/logger.js'

const log = logger.child('sqlite')

const SCHEMA_VERSION = 1

const eventRowSchema = z.object({
  id: z.string(),
  session_id: z.string(),
  kind: z.string(),
  content: z.string(),
  timestamp: z.string(),
  importance: z.number(),
  detail: z.string(),
  metadata: z.string(),
})

const longTermRowSchema = eventRowSchema.extend({
  embedding: z.string().nullable(),
})

const sessionRowSchema = z.object({
  session_id: z.string(),
  created_at: z.string(),
  last_active_at: z.string(),
})

const countRowSchema = z.object({ c: z.number() })
const stateRowSchema = z.object({ value: z.string() })
const versionRowSchema = z.object({ version: z.number() })

const jsonObjectSchema = z.record(z.unknown())
const embeddingSchema = z.array(z.number())


type SqlParam = string | number | null

export class SqliteStorage {
  private db: Database.Database

  constructor(config: Config | null) {
    if (config === null) {
      this.db = new Database(':memory:')
    } else {
      const dbPath = join(config.dataDir, 'agent-recall.db')
      mkdirSync(dirname(dbPath), { recursive: true })
      this.db = new Database(dbPath)
      this.db.pragma('journal_mode = WAL')
      this.db.pragma('busy_timeout = 5000')
      this.db.pragma('wal_autocheckpoint = 1000')
    }
    this.migrate()
  }

  static inMemory(): SqliteStorage {
    return new SqliteStorage(null)
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_version (
        version INTEGER PRIMARY KEY,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS sessions (
        session_id TEXT PRIMARY KEY,
        created_at TEXT NOT NULL,
        last_active_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS session_events (
        session_id TEXT NOT NULL,
        seq INTEGER NOT NULL,
        id TEXT NOT NULL UNIQUE,
        kind TEXT NOT NULL,
        content TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        importance REAL NOT NULL,
        detail TEXT NOT NULL DEFAULT '{}',
        metadata TEXT NOT NULL DEFAULT '{}',
        PRIMARY KEY (session_id, seq)
      );

      CREATE INDEX IF NOT EXISTS idx_session_events_time ON session_events(timestamp, id);
      CREATE INDEX IF NOT EXISTS idx_session_events_kind ON session_events(kind);

      CREATE TABLE IF NOT EXISTS long_term (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL,
        kind TEXT NOT NULL,
        content TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        importance REAL NOT NULL,
        detail TEXT NOT NULL DEFAULT '{}',
        metadata TEXT NOT NULL DEFAULT '{}',
        embedding TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_long_term_time ON long_term(timestamp, id);

      CREATE TABLE IF NOT EXISTS state (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `)

    const existing = versionRowSchema.optional().parse(
      this.db.prepare('SELECT version FROM schema_version ORDER BY version DESC LIMIT 1').get(),
    )
    if (!existing) {
      this.db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION)
      log.debug(`Initialised schema version ${SCHEMA_VERSION}`)
    } else if (existing.version > SCHEMA_VERSION) {
      throw new StorageError(`Database schema version ${existing.version} is newer than supported version ${SCHEMA_VERSION}`)
    }
  }

  // --- Sessions ---

  upsertSession(session: SessionInfo): void {
    this.db.prepare(`
      INSERT INTO sessions (session_id, created_at, last_active_at)
      VALUES (?, ?, ?)
      ON CONFLICT(session_id)
      DO UPDATE SET last_active_at = excluded.last_active_at
    `).run(session.session_id, session.created_at, session.last_active_at)
  }

  getSession(sessionId: string): SessionInfo | null {
    const row = this.db.prepare('SELECT * FROM sessions WHERE session_id = ?').get(sessionId)
    return row === undefined ? null : this.parseRow(sessionRowSchema, row, 'session')
  }

  listSessions(): SessionInfo[] {
    return this.db.prepare('SELECT * FROM sessions ORDER BY created_at, session_id')
      .all()
      .map(r => this.parseRow(sessionRowSchema, r, 'session'))
  }

  // --- Session events ---

  appendEvent(event: MemoryEvent): void {
    this.db.prepare(`
      INSERT INTO session_events (session_id, seq, id, kind, content, timestamp, importance, detail, metadata)
      VALUES (?, (SELECT COALESCE(MAX(seq), 0) + 1 FROM session_events WHERE session_id = ?), ?, ?, ?, ?, ?, ?, ?)
    `).run(
      event.session_id,
      event.session_id,
      event.id,
      event.kind,
      event.content,
      event.timestamp,
      event.importance,
      JSON.stringify(eventDetail(event)),
      JSON.stringify(event.metadata),
    )
  }

  getSessionEvents(sessionId: string): MemoryEvent[] {
    return this.db.prepare('SELECT * FROM session_events WHERE session_id = ? ORDER BY seq')
      .all(sessionId)
      .map(r => this.rowToEvent(r))
  }

  /** Rewrites the whole event log of a session in the given order. */
  replaceSessionEvents(sessionId: string, events: MemoryEvent[]): void {
    this.transaction(() => {
      this.db.prepare('DELETE FROM session_events WHERE session_id = ?').run(sessionId)
      for (const event of events) this.appendEvent(event)
    })
  }

  listEvents(filter: EventQuery = {}): MemoryEvent[] {
    const clauses: string[] = []
    const params: SqlParam[] = []
    if (filter.sessionId !== undefined) {
      clauses.push('session_id = ?')
      params.push(filter.sessionId)
    }
    if (filter.kind !== undefined) {
      clauses.push('kind = ?')
      params.push(filter.kind)
    }
    if (filter.start !== undefined) {
      clauses.push('timestamp >= ?')
      params.push(filter.start)
    }
    if (filter.end !== undefined) {
      clauses.push('timestamp <= ?')
      params.push(filter.end)
    }
    const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : ''
    return this.db.prepare(`SELECT * FROM session_events${where} ORDER BY timestamp, id`)
      .all(...params)
      .map(r => this.rowToEvent(r))
  }

  hasEvent(id: string): boolean {
    return this.db.prepare('SELECT 1 FROM session_events WHERE id = ?').get(id) !== undefined
  }

  countSessionEvents(sessionId?: string): number {
    const row = sessionId === undefined
      ? this.db.prepare('SELECT COUNT(*) as c FROM session_events').get()
      : this.db.prepare('SELECT COUNT(*) as c FROM session_events WHERE session_id = ?').get(sessionId)
    return countRowSchema.parse(row).c
  }

  /** Removes a session and its events, returning the number of events removed. */
  deleteSession(sessionId: string): number {
    return this.transaction(() => {
      const removed = this.db.prepare('DELETE FROM session_events WHERE session_id = ?').run(sessionId).changes
      this.db.prepare('DELETE FROM sessions WHERE session_id = ?').run(sessionId)
      return removed
    })
  }

  deleteAllSessions(): number {
    return this.transaction(() => {
      const removed = this.db.prepare('DELETE FROM session_events').run().changes
      this.db.prepare('DELETE FROM sessions').run()
      return removed
    })
  }

  // --- Long-term ---

  upsertLongTerm(event: MemoryEvent): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO long_term (id, session_id, kind, content, timestamp, importance, detail, metadata, embedding)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      event.id,
      event.session_id,
      event.kind,
      event.content,
      event.timestamp,
      event.importance,
      JSON.stringify(eventDetail(event)),
      JSON.stringify(event.metadata),
      event.embedding === null ? null : JSON.stringify(event.embedding),
    )
  }

  deleteLongTerm(id: string): boolean {
    return this.db.prepare('DELETE FROM long_term WHERE id = ?').run(id).changes > 0
  }

  getLongTermEntries(): MemoryEvent[] {
    return this.db.prepare('SELECT * FROM long_term ORDER BY timestamp, id')
      .all()
      .map(r => {
        const row = this.parseRow(longTermRowSchema, r, 'long-term entry')
        const event = this.rowToEvent(row)
        if (row.embedding !== null) {
          event.embedding = this.parseJson(embeddingSchema, row.embedding, `embedding of ${row.id}`)
        }
        return event
      })
  }

  countLongTerm(): number {
    return countRowSchema.parse(this.db.prepare('SELECT COUNT(*) as c FROM long_term').get()).c
  }

  clearLongTerm(): number {
    return this.db.prepare('DELETE FROM long_term').run().changes
  }

  // --- State ---

  setState(key: string, value: string): void {
    this.db.prepare('INSERT OR REPLACE INTO state (key, value) VALUES (?, ?)').run(key, value)
  }

  getState(key: string): string | null {
    const row = this.db.prepare('SELECT value FROM state WHERE key = ?').get(key)
    return row === undefined ? null : stateRowSchema.parse(row).value
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)()
  }

  close(): void {
    this.db.close()
  }

  // --- Row Converters ---

  private parseRow<T>(schema: z.ZodType<T>, row: unknown, what: string): T {
    const result = schema.safeParse(row)
    if (!result.success) {
      throw new StorageError(`Malformed ${what} row: ${result.error.message}`, result.error)
    }
    return result.data
  }

  private parseJson<T>(schema: z.ZodType<T>, value: string, what: string): T {
    let parsed: unknown
    try {
      parsed = JSON.parse(value)
    } catch (err) {
      throw new StorageError(`Malformed JSON in ${what}`, err)
    }
    return this.parseRow(schema, parsed, what)
  }

  private rowToEvent(raw: unknown): MemoryEvent {
    const row = this.parseRow(eventRowSchema, raw, 'event')
    const detail = this.parseJson(jsonObjectSchema, row.detail, `detail of ${row.id}`)
    return createEvent({
      id: row.id,
      session_id: row.session_id,
      timestamp: row.timestamp,
      content: row.content,
      importance: row.importance,
      metadata: this.parseJson(jsonObjectSchema, row.metadata, `metadata of ${row.id}`),
      embedding: null,
    }, this.parsePayload(row.id, row.kind, detail))
  }

  private parsePayload(id: string, kind: string, detail: Record<string, unknown>): EventPayload {
    try {
      return parsePayload(kind, detail)
    } catch (err) {
      throw new StorageError(`Malformed payload in event ${id}`, err)
    }
  }
}
