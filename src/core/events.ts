import { z } from 'zod'
import { EVENT_KINDS } from './constants.js'
import { InvalidArgumentError, InvalidEventKindError } from './errors.js'
import type { EventBase, EventFilter, EventKind, EventPayload, MemoryEvent } from './types.js'

export const eventPayloadSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('task'), title: z.string().optional() }).strict(),
  z.object({ kind: z.literal('thought') }).strict(),
  z.object({ kind: z.literal('action'), tool: z.string().optional(), input: z.string().optional() }).strict(),
  z.object({ kind: z.literal('observation'), tool: z.string().optional(), success: z.boolean().optional() }).strict(),
  z.object({ kind: z.literal('answer'), question: z.string().optional() }).strict(),
])

export function isEventKind(value: string): value is EventKind {
  return EVENT_KINDS.some(k => k === value)
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

/** Validates a kind plus its kind-specific detail fields into a payload. */
export function parsePayload(kind: string, detail: Record<string, unknown> = {}): EventPayload {
  if (!isEventKind(kind)) throw new InvalidEventKindError(kind)
  const result = eventPayloadSchema.safeParse({ ...detail, kind })
  if (!result.success) {
    throw new InvalidArgumentError(`Invalid ${kind} detail: ${formatIssues(result.error)}`)
  }
  return result.data
}

function defined(fields: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(fields).filter(([, v]) => v !== undefined))
}

/** The kind-specific fields of an event, without `kind` itself. */
export function eventDetail(payload: EventPayload): Record<string, unknown> {
  switch (payload.kind) {
    case 'task':
      return defined({ title: payload.title })
    case 'thought':
      return {}
    case 'action':
      return defined({ tool: payload.tool, input: payload.input })
    case 'observation':
      return defined({ tool: payload.tool, success: payload.success })
    case 'answer':
      return defined({ question: payload.question })
  }
}

export function createEvent(base: EventBase, payload: EventPayload): MemoryEvent {
  return { ...base, ...payload }
}

/** Same event with a different embedding; the payload is carried over unchanged. */
export function withEmbedding(event: MemoryEvent, embedding: number[] | null): MemoryEvent {
  return { ...event, embedding }
}

export type EventQuery = Omit<EventFilter, 'tier'>

export function matchesEventQuery(event: MemoryEvent, query: EventQuery): boolean {
  if (query.sessionId !== undefined && event.session_id !== query.sessionId) return false
  if (query.kind !== undefined && event.kind !== query.kind) return false
  if (query.start !== undefined && event.timestamp < query.start) return false
  if (query.end !== undefined && event.timestamp > query.end) return false
  return true
}

interface Timed {
  timestamp: string
  id: string
}

/** Timestamp ascending, id breaking ties. */
export function compareByTime(a: Timed, b: Timed): number {
  if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1
  if (a.id !== b.id) return a.id < b.id ? -1 : 1
  return 0
}
