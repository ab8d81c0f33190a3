import type { Config } from '../core/config.js'
import { IOFailureError } from '../core/errors.js'
import type { EventQuery } from '../core/events.js'
import { compareByTime, matchesEventQuery } from '../core/events.js'
import type { MemoryEvent, Session, SessionInfo } from '../core/types.js'
import type { SqliteStorage } from '../storage/sqlite.js'
import { logger } from '../utils/logger.js'

const log = logger.child('persistence')

interface PendingEvent {
  session: SessionInfo
  event: MemoryEvent
}

function sessionInfo(session: Session | SessionInfo): SessionInfo {
  return {
    session_id: session.session_id,
    created_at: session.created_at,
    last_active_at: session.last_active_at,
  }
}

/**
 * Write-behind log for session events. Under the `immediate` policy every
 * append is flushed before it returns; under `batched` events queue until
 * `flushBatchSize` is reached or `flush()` is called.
 */
export class SessionPersistence {
  private pending: PendingEvent[] = []

  constructor(
    private sqlite: SqliteStorage,
    private config: Pick<Config, 'flushPolicy' | 'flushBatchSize'>,
    private now: () => Date = () => new Date(),
  ) {}

  get pendingCount(): number {
    return this.pending.length
  }

  /** Returns the number of events written by this call (0 while still queued). */
  append(session: Session, event: MemoryEvent): number {
    this.pending.push({ session: sessionInfo(session), event })
    if (this.config.flushPolicy === 'immediate' || this.pending.length >= this.config.flushBatchSize) {
      return this.flush()
    }
    return 0
  }

  flush(): number {
    if (this.pending.length === 0) return 0
    const batch = this.pending
    const latest = new Map<string, SessionInfo>()
    for (const { session } of batch) latest.set(session.session_id, session)

    try {
      this.sqlite.transaction(() => {
        for (const session of latest.values()) this.sqlite.upsertSession(session)
        for (const { event } of batch) this.sqlite.appendEvent(event)
      })
    } catch (err) {
      throw new IOFailureError(`Failed to flush ${batch.length} session events`, err)
    }

    this.pending = []
    log.debug(`Flushed ${batch.length} events across ${latest.size} sessions`)
    return batch.length
  }

  /** Rewrites a whole session, replacing anything persisted or queued for it. */
  save(session: Session): void {
    try {
      this.sqlite.transaction(() => {
        this.sqlite.upsertSession(sessionInfo(session))
        this.sqlite.replaceSessionEvents(session.session_id, session.events)
      })
    } catch (err) {
      throw new IOFailureError(`Failed to save session ${session.session_id}`, err)
    }
    this.pending = this.pending.filter(p => p.session.session_id !== session.session_id)
  }

  exists(sessionId: string): boolean {
    return this.sqlite.getSession(sessionId) !== null || this.pending.some(p => p.session.session_id === sessionId)
  }

  load(sessionId: string): Session {
    const queued = this.pending.filter(p => p.session.session_id === sessionId)
    const persisted = this.sqlite.getSession(sessionId)
    const events = [...this.sqlite.getSessionEvents(sessionId), ...queued.map(p => p.event)]

    if (queued.length > 0) {
      return { ...queued[queued.length - 1].session, events }
    }
    if (persisted) {
      return { ...persisted, events }
    }
    const created = this.now().toISOString()
    return { session_id: sessionId, created_at: created, last_active_at: created, events }
  }

  listSessions(): string[] {
    const sessions = new Map<string, SessionInfo>()
    for (const session of this.sqlite.listSessions()) sessions.set(session.session_id, session)
    for (const { session } of this.pending) {
      if (!sessions.has(session.session_id)) sessions.set(session.session_id, session)
    }
    return [...sessions.values()]
      .sort((a, b) => (a.created_at === b.created_at
        ? a.session_id.localeCompare(b.session_id)
        : a.created_at < b.created_at ? -1 : 1))
      .map(s => s.session_id)
  }

  sessionInfos(): SessionInfo[] {
    return this.listSessions().map(id => {
      const queued = this.pending.filter(p => p.session.session_id === id)
      return queued.length > 0 ? queued[queued.length - 1].session : this.sqlite.getSession(id) ?? sessionInfo(this.load(id))
    })
  }

  listEvents(filter: EventQuery = {}): MemoryEvent[] {
    const events = new Map<string, MemoryEvent>()
    for (const event of this.sqlite.listEvents(filter)) events.set(event.id, event)
    for (const { event } of this.pending) {
      if (matchesEventQuery(event, filter) && !events.has(event.id)) events.set(event.id, event)
    }
    return [...events.values()].sort(compareByTime)
  }

  deleteSession(sessionId: string): number {
    const queued = this.pending.filter(p => p.session.session_id === sessionId).length
    let removed: number
    try {
      removed = this.sqlite.deleteSession(sessionId)
    } catch (err) {
      throw new IOFailureError(`Failed to delete session ${sessionId}`, err)
    }
    this.pending = this.pending.filter(p => p.session.session_id !== sessionId)
    return removed + queued
  }

  deleteAll(): number {
    const queued = this.pending.length
    let removed: number
    try {
      removed = this.sqlite.deleteAllSessions()
    } catch (err) {
      throw new IOFailureError('Failed to delete sessions', err)
    }
    this.pending = []
    return removed + queued
  }
}
