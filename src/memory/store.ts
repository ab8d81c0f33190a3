import type { Config } from '../core/config.js'
import { EXPORT_FORMAT, EXPORT_VERSION, namespaces, stateKeys } from '../core/constants.js'
import {
  EmbeddingError,
  InvalidArgumentError,
  InvalidEventKindError,
  IOFailureError,
} from '../core/errors.js'
import type { EventQuery } from '../core/events.js'
import { compareByTime, createEvent, isEventKind, matchesEventQuery, parsePayload, withEmbedding } from '../core/events.js'
import type {
  EmbeddingProvider,
  EventFilter,
  EventKind,
  MemoryEvent,
  MemoryStats,
  MemoryTier,
  RecordContext,
  ScoredEvent,
  SearchMode,
  Session,
} from '../core/types.js'
import { generateIdAfter } from '../core/ulid.js'
import type { SqliteStorage } from '../storage/sqlite.js'
import { logger } from '../utils/logger.js'
import { keywordScore } from '../utils/text.js'
import { assertNonEmpty, assertPositiveInt } from '../utils/validation.js'
import type { VectorIndex } from '../vector/vector-index.js'
import { renderContext } from './context.js'
import type { ExportedEvent, ExportFile } from './export.js'
import { fromExportedEvent, readExportFile, toExportedEvent, writeExportFile } from './export.js'
import type { AdmitResult } from './long-term.js'
import { LongTermStore } from './long-term.js'
import { SessionPersistence } from './persistence.js'
import type { ScoringPolicy } from './scoring.js'
import { HeuristicScoringPolicy } from './scoring.js'

const log = logger.child('memory')

const SEARCH_MODES: readonly SearchMode[] = ['keyword', 'semantic', 'hybrid']
const MEMORY_TIERS: readonly MemoryTier[] = ['short_term', 'long_term', 'all']
const MS_PER_HOUR = 3_600_000

export interface MemoryStoreOptions {
  scoring?: ScoringPolicy
  now?: () => Date
}

export interface BuildContextOptions {
  maxEvents?: number
  relatedLimit?: number
}

export interface ExportOptions {
  sessionId?: string
}

export interface CompactionResult {
  examined: number
  evicted: number
}

export type ClearTarget = { sessionId: string } | 'all'

type LongTermWrite = { op: 'upsert'; entry: MemoryEvent } | { op: 'delete'; id: string }

function isSearchMode(value: string): value is SearchMode {
  return SEARCH_MODES.some(m => m === value)
}

function isMemoryTier(value: string): value is MemoryTier {
  return MEMORY_TIERS.some(t => t === value)
}

function normalizeTimestamp(name: string, value: string): string {
  const date = new Date(value)
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError(`${name} must be an ISO-8601 timestamp, got ${value}`)
  }
  return date.toISOString()
}

function compareScored(a: ScoredEvent, b: ScoredEvent): number {
  if (a.score !== b.score) return b.score - a.score
  if (a.event.importance !== b.event.importance) return b.event.importance - a.event.importance
  return -compareByTime(a.event, b.event)
}

function writesFor(event: MemoryEvent, admission: AdmitResult): LongTermWrite[] {
  const writes: LongTermWrite[] = []
  if (admission.evicted) writes.push({ op: 'delete', id: admission.evicted.id })
  if (admission.admitted) writes.push({ op: 'upsert', entry: event })
  return writes
}

/**
 * Short-term session logs plus the bounded long-term tier. Every in-memory
 * mutation runs without an await between its steps; embedding happens
 * before and persistence after.
 */
export class MemoryStore {
  private sessions = new Map<string, Session>()
  private longTerm: LongTermStore
  private persistence: SessionPersistence
  private scoring: ScoringPolicy
  private now: () => Date

  constructor(
    private sqlite: SqliteStorage,
    private index: VectorIndex,
    private embeddings: EmbeddingProvider,
    private config: Config,
    options: MemoryStoreOptions = {},
  ) {
    this.scoring = options.scoring ?? new HeuristicScoringPolicy()
    this.now = options.now ?? (() => new Date())
    this.longTerm = new LongTermStore(index, config.longTermCapacity)
    this.persistence = new SessionPersistence(sqlite, config, this.now)
  }

  get longTermSize(): number {
    return this.longTerm.size
  }

  isLongTerm(id: string): boolean {
    return this.longTerm.has(id)
  }

  get pendingCount(): number {
    return this.persistence.pendingCount
  }

  sessionIds(): string[] {
    return this.persistence.listSessions()
  }

  /** Loads long-term memory from disk into the index. Returns the number of entries restored. */
  async restore(): Promise<number> {
    const stored = this.sqlite.getLongTermEntries()
    const dims = this.embeddings.dimensions()
    const stale = stored.filter(e => e.embedding === null || e.embedding.length !== dims)
    const refreshed = new Map<string, MemoryEvent>()
    if (stale.length > 0) {
      log.info(`Re-embedding ${stale.length} long-term entries at dimension ${dims}`)
      const vectors = await this.embedMany(stale.map(e => e.content))
      stale.forEach((e, i) => refreshed.set(e.id, withEmbedding(e, vectors[i])))
    }

    this.longTerm.clear()
    const writes: LongTermWrite[] = []
    for (const persisted of stored) {
      const entry = refreshed.get(persisted.id) ?? persisted
      const admission = this.longTerm.admit(entry)
      if (!admission.admitted) writes.push({ op: 'delete', id: entry.id })
      else if (refreshed.has(entry.id)) writes.push({ op: 'upsert', entry })
      if (admission.evicted) writes.push({ op: 'delete', id: admission.evicted.id })
    }

    this.writeLongTerm(writes, 'Failed to persist restored long-term memory')
    log.info(`Restored ${this.longTerm.size} long-term entries`)
    return this.longTerm.size
  }

  async record(sessionId: string, kind: string, content: string, context: RecordContext = {}): Promise<MemoryEvent> {
    assertNonEmpty('sessionId', sessionId)
    const payload = parsePayload(kind, context.detail ?? {})
    assertNonEmpty('content', content)
    const metadata = context.metadata ?? {}
    if (typeof metadata !== 'object' || metadata === null || Array.isArray(metadata)) {
      throw new InvalidArgumentError('metadata must be an object')
    }

    const importance = this.scoring.score({
      ...payload,
      content,
      correction: context.correction ?? false,
      metadata,
    })
    const promoted = importance >= this.config.promotionThreshold
    const embedding = promoted ? await this.embedOne(content) : null

    // No await until the event is in the session and, when promoted, in long-term
    const session = this.session(sessionId)
    const last = session.events.at(-1)
    const nowIso = this.now().toISOString()
    const timestamp = last && last.timestamp > nowIso ? last.timestamp : nowIso
    const event = createEvent({
      id: generateIdAfter(Date.parse(timestamp), last?.id),
      session_id: sessionId,
      timestamp,
      content,
      importance,
      metadata: { ...metadata },
      embedding: null,
    }, payload)
    session.events.push(event)
    session.last_active_at = timestamp

    let writes: LongTermWrite[] = []
    if (embedding) {
      const entry = withEmbedding(event, embedding)
      writes = writesFor(entry, this.longTerm.admit(entry))
    }

    const failures: unknown[] = []
    try {
      this.writeLongTerm(writes, `Failed to persist long-term entry ${event.id}`)
    } catch (err) {
      failures.push(err)
    }
    try {
      this.persistence.append(session, event)
    } catch (err) {
      failures.push(err)
    }
    if (failures.length > 0) {
      throw new IOFailureError(`Event ${event.id} was recorded in memory but not persisted`, failures[0], event)
    }

    log.debug(`Recorded ${event.kind} ${event.id} in ${sessionId} (importance ${importance}${promoted ? ', promoted' : ''})`)
    return event
  }

  getContext(sessionId: string, maxEvents: number): MemoryEvent[] {
    assertPositiveInt('maxEvents', maxEvents)
    const session = this.existingSession(sessionId)
    if (!session) return []
    return session.events.slice(-maxEvents)
  }

  async buildContext(sessionId: string, options: BuildContextOptions = {}): Promise<string> {
    const relatedLimit = options.relatedLimit ?? 3
    if (!Number.isInteger(relatedLimit) || relatedLimit < 0) {
      throw new InvalidArgumentError(`relatedLimit must be a non-negative integer, got ${relatedLimit}`)
    }
    const history = this.getContext(sessionId, options.maxEvents ?? 20)

    let related: ScoredEvent[] = []
    if (relatedLimit > 0 && history.length > 0 && this.longTerm.size > 0) {
      const anchor = [...history].reverse().find(e => e.kind === 'task') ?? history[history.length - 1]
      const listed = new Set(history.map(e => e.id))
      const hits = await this.search(anchor.content, 'hybrid', relatedLimit + listed.size)
      related = hits.filter(h => !listed.has(h.event.id)).slice(0, relatedLimit)
    }
    return renderContext(history, related)
  }

  async search(query: string, mode: SearchMode, k: number): Promise<ScoredEvent[]> {
    assertNonEmpty('query', query)
    if (!isSearchMode(mode)) {
      throw new InvalidArgumentError(`Invalid search mode: ${mode}. Expected one of ${SEARCH_MODES.join(', ')}`)
    }
    assertPositiveInt('k', k)
    if (this.longTerm.size === 0) return []

    const queryVector = mode === 'keyword' ? null : await this.embedOne(query)

    const keyword = new Map<string, number>()
    if (mode !== 'semantic') {
      for (const entry of this.longTerm.values()) {
        const score = keywordScore(query, entry.content)
        if (score > 0) keyword.set(entry.id, score)
      }
    }

    const semantic = new Map<string, number>()
    if (queryVector) {
      const hits = this.index.search(queryVector, this.index.size, { namespace: namespaces.memory })
      for (const hit of hits) {
        if (hit.score > this.config.relevanceFloor) semantic.set(hit.id, hit.score)
      }
    }

    const results: ScoredEvent[] = []
    const candidates = new Set([...keyword.keys(), ...semantic.keys()])
    for (const id of candidates) {
      const event = this.longTerm.get(id)
      if (!event) continue
      const keywordPart = keyword.get(id) ?? 0
      const semanticPart = semantic.get(id) ?? 0
      const score = mode === 'keyword'
        ? keywordPart
        : mode === 'semantic'
          ? semanticPart
          : this.config.hybridKeywordWeight * keywordPart + this.config.hybridSemanticWeight * semanticPart
      if (mode === 'hybrid' && score <= 0) continue
      results.push({ event, score, keyword_score: keywordPart, semantic_score: semanticPart })
    }

    return results.sort(compareScored).slice(0, k)
  }

  list(filter: EventFilter = {}): MemoryEvent[] {
    const tier = filter.tier ?? 'all'
    if (!isMemoryTier(tier)) {
      throw new InvalidArgumentError(`Invalid tier: ${tier}. Expected one of ${MEMORY_TIERS.join(', ')}`)
    }
    if (filter.kind !== undefined && !isEventKind(filter.kind)) {
      throw new InvalidEventKindError(filter.kind)
    }
    const query: EventQuery = {
      sessionId: filter.sessionId,
      kind: filter.kind,
      start: filter.start === undefined ? undefined : normalizeTimestamp('start', filter.start),
      end: filter.end === undefined ? undefined : normalizeTimestamp('end', filter.end),
    }
    if (query.start !== undefined && query.end !== undefined && query.start > query.end) {
      throw new InvalidArgumentError(`start ${query.start} is after end ${query.end}`)
    }

    const events = new Map<string, MemoryEvent>()
    if (tier !== 'long_term') {
      for (const event of this.persistence.listEvents(query)) events.set(event.id, event)
    }
    if (tier !== 'short_term') {
      for (const entry of this.longTerm.values()) {
        if (!events.has(entry.id) && matchesEventQuery(entry, query)) events.set(entry.id, entry)
      }
    }
    return [...events.values()].sort(compareByTime)
  }

  stats(sessionId: string): MemoryStats {
    const session = this.existingSession(sessionId)
    const events = session?.events ?? []
    const counts: Record<EventKind, number> = { task: 0, thought: 0, action: 0, observation: 0, answer: 0 }
    let importanceSum = 0
    for (const event of events) {
      counts[event.kind]++
      importanceSum += event.importance
    }

    return {
      session_id: sessionId,
      total_entries: events.length,
      counts_by_kind: counts,
      mean_importance: events.length > 0 ? importanceSum / events.length : 0,
      session_duration_ms: session ? Date.parse(session.last_active_at) - Date.parse(session.created_at) : 0,
      created_at: session?.created_at ?? null,
      last_active_at: session?.last_active_at ?? null,
      long_term_count: this.longTerm.size,
      long_term_capacity: this.longTerm.capacity,
    }
  }

  /** Returns the number of distinct events removed. The document namespace is left alone. */
  clear(target: ClearTarget): number {
    if (target === 'all') {
      const ids = new Set([
        ...this.persistence.listEvents().map(e => e.id),
        ...this.longTerm.values().map(e => e.id),
      ])
      try {
        this.sqlite.transaction(() => {
          this.persistence.deleteAll()
          this.sqlite.clearLongTerm()
        })
      } catch (err) {
        throw err instanceof IOFailureError ? err : new IOFailureError('Failed to clear memory', err)
      }
      this.sessions.clear()
      this.longTerm.clear()
      log.info(`Cleared all memory (${ids.size} events)`)
      return ids.size
    }

    assertNonEmpty('sessionId', target.sessionId)
    const removed = this.persistence.deleteSession(target.sessionId)
    this.sessions.delete(target.sessionId)
    log.info(`Cleared session ${target.sessionId} (${removed} events)`)
    return removed
  }

  async export(path: string, options: ExportOptions = {}): Promise<number> {
    this.flush()
    const { sessionId } = options
    const byId = new Map<string, ExportedEvent>()
    for (const event of this.persistence.listEvents(sessionId === undefined ? {} : { sessionId })) {
      byId.set(event.id, toExportedEvent(event, { short_term: true, long_term: this.longTerm.has(event.id) }))
    }
    for (const entry of this.longTerm.values()) {
      if (sessionId !== undefined && entry.session_id !== sessionId) continue
      if (!byId.has(entry.id)) byId.set(entry.id, toExportedEvent(entry, { short_term: false, long_term: true }))
    }

    const file: ExportFile = {
      format: EXPORT_FORMAT,
      version: EXPORT_VERSION,
      exported_at: this.now().toISOString(),
      sessions: this.persistence.sessionInfos().filter(s => sessionId === undefined || s.session_id === sessionId),
      events: [...byId.values()].sort(compareByTime),
    }
    await writeExportFile(path, file)
    log.info(`Exported ${file.events.length} events to ${path}`)
    return file.events.length
  }

  async import(path: string): Promise<number> {
    const file = await readExportFile(path)
    const entries = file.events.map(raw => ({ raw, event: fromExportedEvent(raw) }))

    const toEmbed = entries.filter(e => e.raw.long_term && !this.longTerm.has(e.event.id))
    const vectors = toEmbed.length > 0 ? await this.embedMany(toEmbed.map(e => e.event.content)) : []

    // Merge without suspending, then persist
    const imported = new Set<string>()
    const known = new Set(this.persistence.listEvents().map(e => e.id))
    const touched = new Map<string, { session: Session; existed: boolean }>()
    for (const { raw, event } of entries) {
      if (!raw.short_term || known.has(event.id)) continue
      let target = touched.get(event.session_id)
      if (!target) {
        const existed = this.existingSession(event.session_id) !== null
        target = { session: this.session(event.session_id), existed }
        touched.set(event.session_id, target)
      }
      target.session.events.push(event)
      known.add(event.id)
      imported.add(event.id)
    }

    const metadata = new Map(file.sessions.map(s => [s.session_id, s]))
    for (const { session, existed } of touched.values()) {
      session.events.sort(compareByTime)
      const meta = metadata.get(session.session_id)
      const created = [meta?.created_at, existed ? session.created_at : undefined, session.events[0].timestamp]
      const active = [meta?.last_active_at, existed ? session.last_active_at : undefined, session.events[session.events.length - 1].timestamp]
      session.created_at = created.filter(isDefined).reduce((a, b) => (b < a ? b : a))
      session.last_active_at = active.filter(isDefined).reduce((a, b) => (b > a ? b : a))
    }

    const writes: LongTermWrite[] = []
    toEmbed.forEach(({ event }, i) => {
      if (this.longTerm.has(event.id)) return
      const entry = withEmbedding(event, vectors[i])
      const admission = this.longTerm.admit(entry)
      if (admission.admitted) imported.add(event.id)
      writes.push(...writesFor(entry, admission))
    })

    try {
      for (const { session } of touched.values()) this.persistence.save(session)
      this.writeLongTerm(writes, 'Failed to persist imported long-term memory')
    } catch (err) {
      throw err instanceof IOFailureError ? err : new IOFailureError(`Failed to persist import from ${path}`, err)
    }

    log.info(`Imported ${imported.size} events from ${path}`)
    return imported.size
  }

  /** Decays long-term importance by age and evicts entries that fall below the promotion threshold. */
  compact(now: Date = this.now()): CompactionResult {
    if (this.config.decayRate >= 1) return { examined: 0, evicted: 0 }

    const entries = this.longTerm.values()
    const expired = entries.filter(entry => {
      const hours = Math.max(0, (now.getTime() - Date.parse(entry.timestamp)) / MS_PER_HOUR)
      return entry.importance * this.config.decayRate ** hours < this.config.promotionThreshold
    })
    for (const entry of expired) this.longTerm.remove(entry.id)

    try {
      this.sqlite.transaction(() => {
        for (const entry of expired) this.sqlite.deleteLongTerm(entry.id)
        this.sqlite.setState(stateKeys.lastCompactionAt, now.toISOString())
      })
    } catch (err) {
      throw new IOFailureError('Failed to persist compaction', err)
    }

    if (expired.length > 0) log.info(`Compaction evicted ${expired.length} of ${entries.length} long-term entries`)
    return { examined: entries.length, evicted: expired.length }
  }

  flush(): number {
    return this.persistence.flush()
  }

  private session(sessionId: string): Session {
    let session = this.sessions.get(sessionId)
    if (!session) {
      session = this.persistence.load(sessionId)
      this.sessions.set(sessionId, session)
    }
    return session
  }

  private existingSession(sessionId: string): Session | null {
    const cached = this.sessions.get(sessionId)
    if (cached) return cached
    return this.persistence.exists(sessionId) ? this.session(sessionId) : null
  }

  private writeLongTerm(writes: LongTermWrite[], message: string): void {
    if (writes.length === 0) return
    try {
      this.sqlite.transaction(() => {
        for (const write of writes) {
          if (write.op === 'upsert') this.sqlite.upsertLongTerm(write.entry)
          else this.sqlite.deleteLongTerm(write.id)
        }
      })
    } catch (err) {
      throw new IOFailureError(message, err)
    }
  }

  private async embedOne(text: string): Promise<number[]> {
    const vector = await this.guardEmbedding(() => this.embeddings.embed(text))
    this.assertDimensions([vector])
    return vector
  }

  private async embedMany(texts: string[]): Promise<number[][]> {
    const vectors = await this.guardEmbedding(() => this.embeddings.embedBatch(texts))
    if (vectors.length !== texts.length) {
      throw new EmbeddingError(`Embedding provider returned ${vectors.length} vectors for ${texts.length} texts`)
    }
    this.assertDimensions(vectors)
    return vectors
  }

  private async guardEmbedding<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      throw err instanceof EmbeddingError ? err : new EmbeddingError('Embedding failed', err)
    }
  }

  private assertDimensions(vectors: number[][]): void {
    const dims = this.index.dimensions()
    const bad = vectors.find(v => v.length !== dims)
    if (bad) {
      throw new EmbeddingError(`Embedding dimension mismatch: expected ${dims}, got ${bad.length}`)
    }
  }
}

function isDefined<T>(value: T | undefined): value is T {
  return value !== undefined
}
