import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import type { Config } from '../core/config.js'
import { loadConfig } from '../core/config.js'
import { EXPORT_FORMAT, EXPORT_VERSION } from '../core/constants.js'
import {
  EmbeddingError,
  InvalidArgumentError,
  InvalidEventKindError,
  IOFailureError,
} from '../core/errors.js'
import type { EmbeddingProvider, EventDraft, SearchMode } from '../core/types.js'
import { SqliteStorage } from '../storage/sqlite.js'
import { FailingEmbeddingProvider, VocabularyEmbeddingProvider } from '../testing/fakes.js'
import { VectorIndex } from '../vector/vector-index.js'
import type { ScoringPolicy } from './scoring.js'
import { MemoryStore } from './store.js'

const VOCAB = ['deploy', 'api', 'gateway', 'database', 'migration', 'cache', 'login', 'bug', 'cookie', 'session']
const T0 = Date.parse('2024-05-01T10:00:00.000Z')

/** Importance by exact content; anything unlisted scores 0.1 and stays short-term. */
function tableScoring(table: Record<string, number>): ScoringPolicy {
  return { score: (draft: EventDraft) => table[draft.content] ?? 0.1 }
}

function makeClock() {
  let t = T0
  return {
    now: () => new Date(t),
    advance: (ms: number) => {
      t += ms
    },
  }
}

interface Harness {
  store: MemoryStore
  sqlite: SqliteStorage
  index: VectorIndex
  embeddings: EmbeddingProvider
  clock: ReturnType<typeof makeClock>
}

function harness(
  overrides: Partial<Config> = {},
  table: Record<string, number> = {},
  options: { sqlite?: SqliteStorage; embeddings?: EmbeddingProvider } = {},
): Harness {
  const config = loadConfig({ longTermCapacity: 3, promotionThreshold: 0.5, ...overrides })
  const sqlite = options.sqlite ?? SqliteStorage.inMemory()
  const embeddings = options.embeddings ?? new VocabularyEmbeddingProvider(VOCAB)
  const index = new VectorIndex(embeddings)
  const clock = makeClock()
  const store = new MemoryStore(sqlite, index, embeddings, config, { scoring: tableScoring(table), now: clock.now })
  return { store, sqlite, index, embeddings, clock }
}

describe('MemoryStore', () => {
  describe('record', () => {
    it('appends to the session and persists immediately', async () => {
      const { store, sqlite } = harness()
      const event = await store.record('s1', 'action', 'ran the migration', {
        detail: { tool: 'shell', input: 'npm run migrate' },
        metadata: { attempt: 1 },
      })

      expect(event).toMatchObject({
        session_id: 's1',
        kind: 'action',
        tool: 'shell',
        input: 'npm run migrate',
        content: 'ran the migration',
        importance: 0.1,
        metadata: { attempt: 1 },
        timestamp: '2024-05-01T10:00:00.000Z',
        embedding: null,
      })
      expect(sqlite.getSessionEvents('s1')).toEqual([event])
      expect(store.longTermSize).toBe(0)
    })

    it('assigns strictly increasing ids within a session', async () => {
      const { store } = harness()
      const a = await store.record('s1', 'thought', 'first')
      const b = await store.record('s1', 'thought', 'second')
      const c = await store.record('s1', 'thought', 'third')
      expect(a.id < b.id && b.id < c.id).toBe(true)
      expect(store.getContext('s1', 10).map(e => e.id)).toEqual([a.id, b.id, c.id])
    })

    it('rejects unknown kinds before touching anything', async () => {
      const { store, sqlite } = harness()
      await expect(store.record('s1', 'dream', 'hello')).rejects.toThrow(InvalidEventKindError)
      expect(store.sessionIds()).toEqual([])
      expect(sqlite.countSessionEvents()).toBe(0)
    })

    it('rejects empty content, empty session ids and bad detail', async () => {
      const { store } = harness()
      await expect(store.record('s1', 'thought', '   ')).rejects.toThrow(InvalidArgumentError)
      await expect(store.record('', 'thought', 'hi')).rejects.toThrow(InvalidArgumentError)
      await expect(store.record('s1', 'observation', 'hi', { detail: { success: 'yes' } })).rejects.toThrow(InvalidArgumentError)
      expect(store.getContext('s1', 5)).toEqual([])
    })

    it('does not embed events below the promotion threshold', async () => {
      const embeddings = new VocabularyEmbeddingProvider(VOCAB)
      const { store, index } = harness({}, { 'minor note': 0.3 }, { embeddings })
      await store.record('s1', 'thought', 'minor note')
      expect(embeddings.calls).toBe(0)
      expect(index.size).toBe(0)
    })

    it('promotes at the threshold with the embedding attached', async () => {
      const { store, index } = harness({}, { 'deploy api': 0.5 })
      const event = await store.record('s1', 'task', 'deploy api')
      expect(store.longTermSize).toBe(1)
      expect(index.get(event.id)?.vector).toEqual([1, 1, 0, 0, 0, 0, 0, 0, 0, 0])
      expect(store.list({ tier: 'long_term' })[0].embedding).toEqual([1, 1, 0, 0, 0, 0, 0, 0, 0, 0])
    })

    it('evicts the lowest thought when an answer arrives at capacity 3', async () => {
      const table = { 'thought one': 0.55, 'thought two': 0.6, 'thought three': 0.65, 'the answer': 0.9 }
      const { store, sqlite } = harness({ longTermCapacity: 3 }, table)
      const one = await store.record('s1', 'thought', 'thought one')
      const two = await store.record('s1', 'thought', 'thought two')
      const three = await store.record('s1', 'thought', 'thought three')
      const answer = await store.record('s1', 'answer', 'the answer')

      const longTermIds = store.list({ tier: 'long_term' }).map(e => e.id)
      expect(longTermIds).toEqual([two.id, three.id, answer.id])
      expect(longTermIds).not.toContain(one.id)
      expect(store.getContext('s1', 10)).toHaveLength(4)
      expect(sqlite.getLongTermEntries().map(e => e.id)).toEqual([two.id, three.id, answer.id])
    })

    it('never lets long-term exceed capacity', async () => {
      const table: Record<string, number> = {}
      for (let i = 0; i < 12; i++) table[`event ${i}`] = 0.5 + (i % 5) / 10
      const { store } = harness({ longTermCapacity: 4 }, table)
      for (let i = 0; i < 12; i++) {
        await store.record(`s${i % 2}`, 'observation', `event ${i}`)
        expect(store.longTermSize).toBeLessThanOrEqual(4)
      }
      expect(store.longTermSize).toBe(4)
      expect(Math.min(...store.list({ tier: 'long_term' }).map(e => e.importance))).toBe(0.8)
    })

    it('leaves the store unchanged when embedding fails', async () => {
      const { store, sqlite } = harness({}, { important: 0.9 }, { embeddings: new FailingEmbeddingProvider(VOCAB.length) })
      await expect(store.record('s1', 'answer', 'important')).rejects.toThrow(EmbeddingError)
      expect(store.getContext('s1', 5)).toEqual([])
      expect(store.longTermSize).toBe(0)
      expect(sqlite.countSessionEvents()).toBe(0)
    })

    it('keeps the event in memory and reports it when persisting fails', async () => {
      const { store, sqlite } = harness()
      vi.spyOn(sqlite, 'appendEvent').mockImplementation(() => {
        throw new Error('SQLITE_READONLY')
      })

      const err = await store.record('s1', 'thought', 'unsaved').catch((e: unknown) => e)
      expect(err).toBeInstanceOf(IOFailureError)
      if (!(err instanceof IOFailureError)) throw err
      expect(err.event?.content).toBe('unsaved')
      expect(store.getContext('s1', 5).map(e => e.id)).toEqual([err.event?.id])
      expect(store.pendingCount).toBe(1)
    })
  })

  describe('getContext', () => {
    it('returns [] for an unknown session', () => {
      const { store } = harness()
      expect(store.getContext('nobody', 10)).toEqual([])
    })

    it('rejects non-positive and fractional limits', () => {
      const { store } = harness()
      expect(() => store.getContext('s1', 0)).toThrow(InvalidArgumentError)
      expect(() => store.getContext('s1', -3)).toThrow(InvalidArgumentError)
      expect(() => store.getContext('s1', 1.5)).toThrow(InvalidArgumentError)
    })

    it('returns the most recent events in temporal order', async () => {
      const { store } = harness()
      for (const content of ['a', 'b', 'c', 'd']) await store.record('s1', 'thought', content)
      expect(store.getContext('s1', 2).map(e => e.content)).toEqual(['c', 'd'])
    })

    it('reads sessions persisted by an earlier store', async () => {
      const first = harness()
      await first.store.record('s1', 'thought', 'remember me')
      const second = harness({}, {}, { sqlite: first.sqlite })
      expect(second.store.getContext('s1', 5).map(e => e.content)).toEqual(['remember me'])
    })
  })

  describe('search', () => {
    const table = {
      'deploy the api gateway': 0.7,
      'database migration failed': 0.6,
      'login bug in cookie session': 0.8,
    }
    let h: Harness

    beforeEach(async () => {
      h = harness({ longTermCapacity: 10 }, table)
      for (const content of Object.keys(table)) {
        await h.store.record('s1', 'observation', content)
        h.clock.advance(1000)
      }
    })

    it('matches keywords case-insensitively', async () => {
      const hits = await h.store.search('DEPLOY the API', 'keyword', 5)
      expect(hits).toHaveLength(1)
      expect(hits[0]).toMatchObject({ score: 1, keyword_score: 1, semantic_score: 0 })
      expect(hits[0].event.content).toBe('deploy the api gateway')
    })

    it('scores partial keyword matches by token overlap', async () => {
      const hits = await h.store.search('gateway outage', 'keyword', 5)
      expect(hits.map(x => [x.event.content, x.score])).toEqual([['deploy the api gateway', 0.5]])
    })

    it('ranks semantically and drops hits at the relevance floor', async () => {
      const hits = await h.store.search('api gateway', 'semantic', 5)
      expect(hits).toHaveLength(1)
      expect(hits[0].event.content).toBe('deploy the api gateway')
      expect(hits[0].score).toBeCloseTo(2 / Math.sqrt(6))
      expect(hits[0].keyword_score).toBe(0)
    })

    it('combines both signals in hybrid mode', async () => {
      const hits = await h.store.search('database cache', 'hybrid', 5)
      expect(hits).toHaveLength(1)
      expect(hits[0].event.content).toBe('database migration failed')
      expect(hits[0].keyword_score).toBe(0.5)
      expect(hits[0].semantic_score).toBeCloseTo(0.5)
      expect(hits[0].score).toBeCloseTo(0.5)
    })

    it('returns at most k results', async () => {
      const hits = await h.store.search('session gateway migration', 'keyword', 2)
      expect(hits).toHaveLength(2)
    })

    it('rejects bad k, unknown modes and empty queries', async () => {
      await expect(h.store.search('api', 'keyword', 0)).rejects.toThrow(InvalidArgumentError)
      await expect(h.store.search('api', 'keyword', -1)).rejects.toThrow(InvalidArgumentError)
      await expect(h.store.search('api', 'fuzzy' as SearchMode, 3)).rejects.toThrow('Invalid search mode: fuzzy')
      await expect(h.store.search('  ', 'hybrid', 3)).rejects.toThrow(InvalidArgumentError)
    })

    it('breaks score ties by importance, then recency', async () => {
      const tied = harness({ longTermCapacity: 10 }, { 'cookie a': 0.6, 'cookie b': 0.9, 'cookie c': 0.6 })
      await tied.store.record('s1', 'thought', 'cookie a')
      tied.clock.advance(1000)
      await tied.store.record('s1', 'thought', 'cookie b')
      tied.clock.advance(1000)
      await tied.store.record('s1', 'thought', 'cookie c')

      const hits = await tied.store.search('cookie', 'keyword', 3)
      expect(hits.map(x => x.event.content)).toEqual(['cookie b', 'cookie c', 'cookie a'])
    })

    it('searches long-term memory only', async () => {
      await h.store.record('s1', 'thought', 'deploy notes that were never promoted')
      const hits = await h.store.search('deploy', 'keyword', 10)
      expect(hits.map(x => x.event.content)).toEqual(['deploy the api gateway'])
    })
  })

  it('returns [] when long-term memory is empty', async () => {
    const { store } = harness()
    expect(await store.search('anything', 'hybrid', 3)).toEqual([])
  })

  describe('list', () => {
    it('merges tiers without duplicates, ordered by time', async () => {
      const { store, clock } = harness({}, { promoted: 0.9 })
      const a = await store.record('s1', 'thought', 'plain')
      clock.advance(1000)
      const b = await store.record('s2', 'answer', 'promoted')

      expect(store.list().map(e => e.id)).toEqual([a.id, b.id])
      expect(store.list({ tier: 'short_term' }).map(e => e.id)).toEqual([a.id, b.id])
      expect(store.list({ tier: 'long_term' }).map(e => e.id)).toEqual([b.id])
      expect(store.list({ sessionId: 's1' }).map(e => e.id)).toEqual([a.id])
      expect(store.list({ kind: 'answer' }).map(e => e.id)).toEqual([b.id])
      expect(store.list({ start: '2024-05-01T10:00:01Z' }).map(e => e.id)).toEqual([b.id])
      expect(store.list({ end: '2024-05-01T10:00:00Z' }).map(e => e.id)).toEqual([a.id])
    })

    it('rejects invalid kinds, tiers and ranges', () => {
      const { store } = harness()
      expect(() => store.list({ kind: 'dream' as 'task' })).toThrow(InvalidEventKindError)
      expect(() => store.list({ tier: 'archive' as 'all' })).toThrow(InvalidArgumentError)
      expect(() => store.list({ start: 'yesterday' })).toThrow('start must be an ISO-8601 timestamp')
      expect(() => store.list({ start: '2024-05-02T00:00:00Z', end: '2024-05-01T00:00:00Z' })).toThrow(InvalidArgumentError)
    })
  })

  describe('stats', () => {
    it('summarises a session', async () => {
      const { store, clock } = harness({}, { 'ship it': 0.8, 'check logs': 0.4 })
      await store.record('s1', 'task', 'ship it')
      clock.advance(90_000)
      await store.record('s1', 'action', 'check logs')

      expect(store.stats('s1')).toEqual({
        session_id: 's1',
        total_entries: 2,
        counts_by_kind: { task: 1, thought: 0, action: 1, observation: 0, answer: 0 },
        mean_importance: expect.closeTo(0.6, 10),
        session_duration_ms: 90_000,
        created_at: '2024-05-01T10:00:00.000Z',
        last_active_at: '2024-05-01T10:01:30.000Z',
        long_term_count: 1,
        long_term_capacity: 3,
      })
    })

    it('reports zeros for an unknown session', () => {
      const { store } = harness()
      const stats = store.stats('ghost')
      expect(stats.total_entries).toBe(0)
      expect(stats.mean_importance).toBe(0)
      expect(stats.session_duration_ms).toBe(0)
      expect(stats.created_at).toBeNull()
      expect(stats.counts_by_kind.answer).toBe(0)
    })
  })

  describe('clear', () => {
    it('removes one session and keeps long-term memory', async () => {
      const { store, sqlite } = harness({}, { keep: 0.9 })
      await store.record('s1', 'answer', 'keep')
      await store.record('s1', 'thought', 'drop')
      await store.record('s2', 'thought', 'other')

      expect(store.clear({ sessionId: 's1' })).toBe(2)
      expect(store.getContext('s1', 5)).toEqual([])
      expect(sqlite.countSessionEvents()).toBe(1)
      expect(store.longTermSize).toBe(1)
    })

    it('wipes everything except documents on "all"', async () => {
      const { store, sqlite, index } = harness({}, { keep: 0.9 })
      index.put('doc:manual#0', new Array(VOCAB.length).fill(0), 'manual', { namespace: 'document' })
      await store.record('s1', 'answer', 'keep')
      await store.record('s2', 'thought', 'other')
      store.clear({ sessionId: 's2' })

      expect(store.clear('all')).toBe(1)
      expect(store.sessionIds()).toEqual([])
      expect(store.longTermSize).toBe(0)
      expect(sqlite.countLongTerm()).toBe(0)
      expect(index.size).toBe(1)
      expect(index.has('doc:manual#0')).toBe(true)
    })
  })

  describe('export and import', () => {
    let dir: string

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'agent-recall-store-'))
    })

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true })
    })

    const table = { 'fix the login bug': 0.7, 'cookie session expired': 0.9 }

    async function populate(h: Harness): Promise<void> {
      await h.store.record('s1', 'task', 'fix the login bug', { detail: { title: 'login' } })
      h.clock.advance(1000)
      await h.store.record('s1', 'thought', 'maybe the cookie', { metadata: { confidence: 'low' } })
      h.clock.advance(1000)
      await h.store.record('s2', 'observation', 'cookie session expired', { detail: { success: false } })
      h.clock.advance(1000)
      await h.store.record('s1', 'answer', 'extend the cookie lifetime')
    }

    it('round-trips sessions and long-term memory into a fresh store', async () => {
      const source = harness({}, table)
      await populate(source)
      const path = join(dir, 'memory.json')
      expect(await source.store.export(path)).toBe(4)

      const target = harness({}, table)
      expect(await target.store.import(path)).toBe(4)

      expect(target.store.sessionIds()).toEqual(source.store.sessionIds())
      for (const id of ['s1', 's2']) {
        expect(target.store.getContext(id, 100)).toEqual(source.store.getContext(id, 100))
        expect(target.store.stats(id)).toEqual(source.store.stats(id))
      }
      expect(target.store.list({ tier: 'long_term' })).toEqual(source.store.list({ tier: 'long_term' }))
    })

    it('skips events that already exist', async () => {
      const h = harness({}, table)
      await populate(h)
      const path = join(dir, 'memory.json')
      await h.store.export(path)
      expect(await h.store.import(path)).toBe(0)
      expect(h.store.getContext('s1', 100)).toHaveLength(3)
    })

    it('restricts an export to one session', async () => {
      const h = harness({}, table)
      await populate(h)
      const path = join(dir, 's2.json')
      expect(await h.store.export(path, { sessionId: 's2' })).toBe(1)

      const target = harness({}, table)
      await target.store.import(path)
      expect(target.store.sessionIds()).toEqual(['s2'])
    })

    it('merges imported events into an existing session in time order', async () => {
      const source = harness({}, table)
      await populate(source)
      const path = join(dir, 'memory.json')
      await source.store.export(path)

      const target = harness({}, table)
      target.clock.advance(1500)
      const local = await target.store.record('s1', 'thought', 'local note')
      await target.store.import(path)

      const contents = target.store.getContext('s1', 100).map(e => e.content)
      expect(contents).toEqual(['fix the login bug', 'maybe the cookie', 'local note', 'extend the cookie lifetime'])
      expect(target.store.stats('s1').created_at).toBe('2024-05-01T10:00:00.000Z')
      expect(target.store.getContext('s1', 100)[2].id).toBe(local.id)
    })

    it('orders events recorded after a future-dated import', async () => {
      const path = join(dir, 'future.json')
      const future = '2030-01-01T00:00:00.000Z'
      writeFileSync(path, JSON.stringify({
        format: EXPORT_FORMAT,
        version: EXPORT_VERSION,
        exported_at: future,
        sessions: [{ session_id: 's1', created_at: future, last_active_at: future }],
        events: [{
          id: '7Z00000000000000000000000A',
          session_id: 's1',
          timestamp: future,
          kind: 'thought',
          content: 'imported note',
          importance: 0.1,
          short_term: true,
          long_term: false,
        }],
      }))

      const h = harness()
      expect(await h.store.import(path)).toBe(1)
      const recorded = await h.store.record('s1', 'thought', 'local note')

      expect(recorded.id).toBe('7Z00000000000000000000000B')
      expect(recorded.timestamp).toBe(future)
      const inContext = h.store.getContext('s1', 10).map(e => e.content)
      expect(inContext).toEqual(['imported note', 'local note'])
      expect(h.store.list({ sessionId: 's1' }).map(e => e.content)).toEqual(inContext)
    })

    it('exports long-term entries whose session was cleared', async () => {
      const h = harness({}, table)
      await populate(h)
      h.store.clear({ sessionId: 's2' })
      const path = join(dir, 'memory.json')
      expect(await h.store.export(path)).toBe(4)

      const target = harness({}, table)
      expect(await target.store.import(path)).toBe(4)
      expect(target.store.sessionIds()).toEqual(['s1'])
      expect(target.store.longTermSize).toBe(2)
    })

    it('reports write failures as IOFailureError', async () => {
      const { store } = harness()
      const blocker = join(dir, 'file')
      await store.export(blocker)
      await expect(store.export(join(blocker, 'nested.json'))).rejects.toThrow(IOFailureError)
    })
  })

  describe('compact', () => {
    it('is a no-op without decay', async () => {
      const { store } = harness({}, { kept: 0.9 })
      await store.record('s1', 'answer', 'kept')
      expect(store.compact(new Date(T0 + 100 * 3_600_000))).toEqual({ examined: 0, evicted: 0 })
      expect(store.longTermSize).toBe(1)
    })

    it('evicts entries whose decayed importance drops below the threshold', async () => {
      const { store, sqlite, clock } = harness({ decayRate: 0.5 }, { old: 0.8, fresh: 0.95 })
      const old = await store.record('s1', 'answer', 'old')
      clock.advance(3_600_000)
      const fresh = await store.record('s1', 'answer', 'fresh')

      expect(store.compact(new Date(T0 + 3_600_000))).toEqual({ examined: 2, evicted: 1 })
      expect(store.list({ tier: 'long_term' }).map(e => e.id)).toEqual([fresh.id])
      expect(store.list({ tier: 'long_term' })[0].importance).toBe(0.95)
      expect(sqlite.getLongTermEntries().map(e => e.id)).toEqual([fresh.id])
      expect(sqlite.getState('last_compaction_at')).toBe('2024-05-01T11:00:00.000Z')
      expect(store.getContext('s1', 5).map(e => e.id)).toEqual([old.id, fresh.id])
    })
  })

  describe('restore', () => {
    it('reloads long-term memory into a new index', async () => {
      const first = harness({}, { 'deploy api': 0.9 })
      await first.store.record('s1', 'task', 'deploy api')

      const second = harness({}, {}, { sqlite: first.sqlite })
      expect(await second.store.restore()).toBe(1)
      const hits = await second.store.search('api', 'semantic', 3)
      expect(hits.map(x => x.event.content)).toEqual(['deploy api'])
    })

    it('re-embeds entries stored at another dimension', async () => {
      const first = harness({}, { 'deploy api': 0.9 })
      const event = await first.store.record('s1', 'task', 'deploy api')

      const smaller = new VocabularyEmbeddingProvider(['api', 'deploy'])
      const second = harness({}, {}, { sqlite: first.sqlite, embeddings: smaller })
      await second.store.restore()
      expect(second.index.get(event.id)?.vector).toEqual([1, 1])
      expect(first.sqlite.getLongTermEntries()[0].embedding).toEqual([1, 1])
    })

    it('applies a smaller capacity on restore', async () => {
      const first = harness({}, { a: 0.6, b: 0.7, c: 0.8 })
      for (const content of ['a', 'b', 'c']) await first.store.record('s1', 'thought', content)

      const second = harness({ longTermCapacity: 2 }, {}, { sqlite: first.sqlite })
      expect(await second.store.restore()).toBe(2)
      expect(first.sqlite.getLongTermEntries().map(e => e.content)).toEqual(['b', 'c'])
    })
  })

  describe('batched flushing', () => {
    it('queues events until flushed or exported', async () => {
      const { store, sqlite } = harness({ flushPolicy: 'batched', flushBatchSize: 10 })
      await store.record('s1', 'thought', 'one')
      await store.record('s1', 'thought', 'two')

      expect(store.pendingCount).toBe(2)
      expect(sqlite.countSessionEvents()).toBe(0)
      expect(store.list().map(e => e.content)).toEqual(['one', 'two'])
      expect(store.flush()).toBe(2)
      expect(sqlite.countSessionEvents('s1')).toBe(2)
    })
  })

  describe('buildContext', () => {
    it('renders history followed by related long-term memories', async () => {
      const { store, clock } = harness({}, {
        'login bug was a cookie session timeout': 0.9,
        'fix the login bug': 0.6,
      })
      await store.record('s0', 'answer', 'login bug was a cookie session timeout')
      clock.advance(10_000)
      await store.record('s1', 'task', 'fix the login bug')
      clock.advance(10_000)
      await store.record('s1', 'thought', 'check cookie session')

      expect(await store.buildContext('s1')).toBe([
        '## Conversation history',
        '[10:00:10] task: fix the login bug',
        '[10:00:20] thought: check cookie session',
        '',
        '## Related memories',
        '- (answer, importance 0.9) login bug was a cookie session timeout',
      ].join('\n'))
    })

    it('renders an empty session without related memories', async () => {
      const { store } = harness()
      expect(await store.buildContext('nobody')).toBe('## Conversation history\n(no events)')
    })
  })
})
