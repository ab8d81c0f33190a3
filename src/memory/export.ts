import { mkdir, readFile, writeFile } from 'fs/promises'
import { dirname } from 'path'
import { z } from 'zod'
import { EXPORT_FORMAT, EXPORT_VERSION } from '../core/constants.js'
import { InvalidArgumentError, IOFailureError } from '../core/errors.js'
import { createEvent, eventDetail, formatIssues, parsePayload } from '../core/events.js'
import type { MemoryEvent } from '../core/types.js'

const exportedSessionSchema = z.object({
  session_id: z.string().min(1),
  created_at: z.string().datetime(),
  last_active_at: z.string().datetime(),
})

const exportedEventSchema = z.object({
  id: z.string().min(1),
  session_id: z.string().min(1),
  timestamp: z.string().datetime(),
  kind: z.string(),
  content: z.string().min(1),
  importance: z.number().min(0).max(1),
  detail: z.record(z.unknown()).default({}),
  metadata: z.record(z.unknown()).default({}),
  short_term: z.boolean(),
  long_term: z.boolean(),
})

export const exportFileSchema = z.object({
  format: z.literal(EXPORT_FORMAT),
  version: z.number().int(),
  exported_at: z.string(),
  sessions: z.array(exportedSessionSchema),
  events: z.array(exportedEventSchema),
})

export type ExportFile = z.infer<typeof exportFileSchema>
export type ExportedEvent = z.infer<typeof exportedEventSchema>

export interface TierFlags {
  short_term: boolean
  long_term: boolean
}

export function toExportedEvent(event: MemoryEvent, flags: TierFlags): ExportedEvent {
  return {
    id: event.id,
    session_id: event.session_id,
    timestamp: event.timestamp,
    kind: event.kind,
    content: event.content,
    importance: event.importance,
    detail: eventDetail(event),
    metadata: event.metadata,
    short_term: flags.short_term,
    long_term: flags.long_term,
  }
}

/** Rebuilds the event without an embedding; long-term copies are re-embedded on import. */
export function fromExportedEvent(exported: ExportedEvent): MemoryEvent {
  return createEvent({
    id: exported.id,
    session_id: exported.session_id,
    timestamp: exported.timestamp,
    content: exported.content,
    importance: exported.importance,
    metadata: exported.metadata,
    embedding: null,
  }, parsePayload(exported.kind, exported.detail))
}

export async function writeExportFile(path: string, file: ExportFile): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true })
    await writeFile(path, JSON.stringify(file, null, 2) + '\n', 'utf-8')
  } catch (err) {
    throw new IOFailureError(`Failed to write export file ${path}`, err)
  }
}

export async function readExportFile(path: string): Promise<ExportFile> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (err) {
    throw new IOFailureError(`Failed to read export file ${path}`, err)
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    throw new InvalidArgumentError(`Export file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`)
  }

  const result = exportFileSchema.safeParse(raw)
  if (!result.success) {
    throw new InvalidArgumentError(`Export file ${path} is malformed: ${formatIssues(result.error)}`)
  }
  if (result.data.version !== EXPORT_VERSION) {
    throw new InvalidArgumentError(`Unsupported export version ${result.data.version}, expected ${EXPORT_VERSION}`)
  }
  return result.data
}
