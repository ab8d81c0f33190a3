import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'
import { AgentRecallError, InvalidArgumentError, InvalidEventKindError } from '../core/errors.js'
import { isEventKind } from '../core/events.js'
import type { MemoryEvent, MemoryStats, RagAnswered, ScoredEvent } from '../core/types.js'
import type { MemoryStore } from '../memory/store.js'
import type { RagEngine } from '../rag/engine.js'
import { logger } from '../utils/logger.js'
import { escapeXml, formatXml, xmlElement } from '../utils/xml.js'

const log = logger.child('mcp')

const KIND_HELP = 'One of task, thought, action, observation, answer'

function text(body: string): CallToolResult {
  return { content: [{ type: 'text' as const, text: body }] }
}

export function formatError(err: unknown): string {
  if (err instanceof AgentRecallError) {
    return `<error code="${escapeXml(err.code)}">${escapeXml(err.message)}</error>`
  }
  const message = err instanceof Error ? err.message : String(err)
  return `<error code="INTERNAL">${escapeXml(message)}</error>`
}

/** Runs a tool body and turns any failure into an `<error>` result. */
async function safely(tool: string, fn: () => Promise<string> | string): Promise<CallToolResult> {
  try {
    return text(await fn())
  } catch (err) {
    log.warn(`Tool ${tool} failed`, err instanceof Error ? err.message : err)
    return { ...text(formatError(err)), isError: true }
  }
}

function formatEvent(event: MemoryEvent, extra: Record<string, string | number> = {}): string {
  return xmlElement('event', {
    id: event.id,
    session: event.session_id,
    kind: event.kind,
    importance: event.importance.toFixed(2),
    at: event.timestamp,
    ...extra,
  }, escapeXml(event.content))
}

function formatEvents(tag: string, attrs: Record<string, string | number>, events: string[]): string {
  return xmlElement(tag, { count: events.length, ...attrs }, events.join('\n\n'))
}

export function formatHit(hit: ScoredEvent): string {
  return formatEvent(hit.event, {
    score: hit.score.toFixed(3),
    keyword: hit.keyword_score.toFixed(3),
    semantic: hit.semantic_score.toFixed(3),
  })
}

export function formatStats(stats: MemoryStats): string {
  const kinds = Object.entries(stats.counts_by_kind)
    .map(([kind, count]) => `    <${kind}>${count}</${kind}>`)
    .join('\n')
  return `<memory_stats session="${escapeXml(stats.session_id)}">
  <total_entries>${stats.total_entries}</total_entries>
  <counts_by_kind>
${kinds}
  </counts_by_kind>
  <mean_importance>${stats.mean_importance.toFixed(3)}</mean_importance>
  <session_duration_ms>${stats.session_duration_ms}</session_duration_ms>
  <created_at>${stats.created_at ?? 'never'}</created_at>
  <last_active_at>${stats.last_active_at ?? 'never'}</last_active_at>
  <long_term>${stats.long_term_count}/${stats.long_term_capacity}</long_term>
</memory_stats>`
}

export function formatAnswer(result: RagAnswered): string {
  const sources = result.sources.map(s =>
    formatXml('source', { id: s.id, source: s.source, similarity: s.similarity.toFixed(3), score: s.score.toFixed(3) }),
  )
  return xmlElement(
    'rag_answer',
    { confidence: result.confidence.toFixed(3), sources: result.sources.length },
    [escapeXml(result.answer), ...sources].join('\n'),
  )
}

export async function createMcpServer(store: MemoryStore, rag: RagEngine): Promise<McpServer> {
  const server = new McpServer({
    name: 'agent-recall',
    version: '0.1.0',
  })

  // ========== SESSION MEMORY TOOLS ==========

  server.tool(
    'record_event',
    'Record an event in a session timeline. Events important enough are also promoted to long-term memory, where they become searchable.',
    {
      session_id: z.string().describe('Session identifier (use a consistent ID across one task)'),
      kind: z.string().describe(KIND_HELP),
      content: z.string().describe('Natural language description of the event'),
      detail: z.record(z.unknown()).optional().describe('Kind-specific fields, e.g. { "tool": "shell" } for an action'),
      correction: z.boolean().optional().describe('Marks an event that corrects an earlier mistake'),
      metadata: z.record(z.unknown()).optional().describe('Additional structured data'),
    },
    async (args) => safely('record_event', async () => {
      const event = await store.record(args.session_id, args.kind, args.content, {
        detail: args.detail,
        correction: args.correction,
        metadata: args.metadata,
      })
      return formatXml('event_recorded', {
        id: event.id,
        session: event.session_id,
        kind: event.kind,
        importance: event.importance.toFixed(2),
        long_term: String(store.isLongTerm(event.id)),
        at: event.timestamp,
      })
    }),
  )

  server.tool(
    'get_context',
    'Retrieve the most recent events of a session in chronological order. With render=true, returns a prompt-ready summary that also lists related long-term memories.',
    {
      session_id: z.string().describe('Session identifier'),
      max_events: z.number().int().min(1).max(500).optional().describe('Max events (default 20)'),
      render: z.boolean().optional().describe('Return rendered text instead of event elements'),
    },
    async (args) => safely('get_context', async () => {
      const maxEvents = args.max_events ?? 20
      if (args.render) {
        const rendered = await store.buildContext(args.session_id, { maxEvents })
        return xmlElement('context', { session: args.session_id }, escapeXml(rendered))
      }
      const events = store.getContext(args.session_id, maxEvents)
      return formatEvents('context', { session: args.session_id }, events.map(e => formatEvent(e)))
    }),
  )

  server.tool(
    'memory_search',
    'Search long-term memory by keyword, semantic similarity or a weighted blend of both. Returns entries ranked by relevance.',
    {
      query: z.string().describe('Natural language search query'),
      mode: z.enum(['keyword', 'semantic', 'hybrid']).optional().describe('Search mode (default hybrid)'),
      k: z.number().int().min(1).max(100).optional().describe('Max results (default 5)'),
    },
    async (args) => safely('memory_search', async () => {
      const mode = args.mode ?? 'hybrid'
      const hits = await store.search(args.query, mode, args.k ?? 5)
      return formatEvents('search_results', { mode }, hits.map(formatHit))
    }),
  )

  server.tool(
    'memory_list',
    'List stored events in chronological order, optionally filtered by session, kind, time range and tier.',
    {
      session_id: z.string().optional().describe('Filter to a session'),
      kind: z.string().optional().describe(KIND_HELP),
      start: z.string().optional().describe('Start of time range (ISO-8601, inclusive)'),
      end: z.string().optional().describe('End of time range (ISO-8601, inclusive)'),
      tier: z.enum(['short_term', 'long_term', 'all']).optional().describe('Memory tier (default all)'),
    },
    async (args) => safely('memory_list', () => {
      const { kind } = args
      if (kind !== undefined && !isEventKind(kind)) throw new InvalidEventKindError(kind)
      const events = store.list({
        sessionId: args.session_id,
        kind,
        start: args.start,
        end: args.end,
        tier: args.tier,
      })
      return formatEvents('events', { tier: args.tier ?? 'all' }, events.map(e => formatEvent(e)))
    }),
  )

  server.tool(
    'memory_stats',
    'Get statistics for a session: entry counts by kind, mean importance, duration and long-term usage.',
    {
      session_id: z.string().describe('Session identifier'),
    },
    async (args) => safely('memory_stats', () => formatStats(store.stats(args.session_id))),
  )

  server.tool(
    'memory_clear',
    'Delete the events of one session, or all memory with all=true. Loaded documents are kept.',
    {
      session_id: z.string().optional().describe('Session to clear'),
      all: z.boolean().optional().describe('Clear every session and long-term memory'),
    },
    async (args) => safely('memory_clear', () => {
      if (args.all && args.session_id !== undefined) {
        throw new InvalidArgumentError('Pass either session_id or all=true, not both')
      }
      if (args.all) return formatXml('memory_cleared', { target: 'all', removed: store.clear('all') })
      if (args.session_id === undefined) {
        throw new InvalidArgumentError('Pass session_id or all=true')
      }
      return formatXml('memory_cleared', {
        target: args.session_id,
        removed: store.clear({ sessionId: args.session_id }),
      })
    }),
  )

  server.tool(
    'memory_export',
    'Write sessions and long-term memory to a JSON export file that `agent-recall import` can load.',
    {
      path: z.string().describe('Destination file path'),
      session_id: z.string().optional().describe('Export only this session'),
    },
    async (args) => safely('memory_export', async () => {
      const count = await store.export(args.path, { sessionId: args.session_id })
      return formatXml('memory_exported', { path: args.path, events: count })
    }),
  )

  // ========== DOCUMENT TOOLS ==========

  server.tool(
    'rag_query',
    'Answer a question from the loaded document corpus. Returns the answer, a confidence score and the passages used. Requires ANTHROPIC_API_KEY.',
    {
      question: z.string().describe('Natural language question'),
      k: z.number().int().min(1).max(50).optional().describe('Passages to retrieve (default from config)'),
      rerank: z.boolean().optional().describe('Rerank passages by keyword overlap'),
    },
    async (args) => safely('rag_query', async () => {
      const result = await rag.query(args.question, { k: args.k, rerank: args.rerank })
      if (result.status === 'failed') throw new AgentRecallError(result.message, result.reason.toUpperCase())
      return formatAnswer(result)
    }),
  )

  return server
}

export async function startMcpServer(store: MemoryStore, rag: RagEngine): Promise<McpServer> {
  const server = await createMcpServer(store, rag)
  const transport = new StdioServerTransport()
  await server.connect(transport)
  log.info('Agent Recall MCP server started (stdio transport)')
  return server
}
