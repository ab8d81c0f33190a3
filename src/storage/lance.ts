import * as lancedb from '@lancedb/lancedb'
import { mkdirSync } from 'fs'
import { join } from 'path'
import { z } from 'zod'
import type { Config } from '../core/config.js'
import { StorageError } from '../core/errors.js'

const DOCUMENTS_TABLE = 'documents'

export interface DocumentRecord {
  id: string
  vector: number[]
  text: string
  source: string
  metadata: Record<string, unknown>
}

const documentRowSchema = z.object({
  id: z.string(),
  vector: z.unknown(),
  text: z.string(),
  source: z.string(),
  metadata: z.string(),
})

const metadataSchema = z.record(z.unknown())

// Arrow hands vector columns back as typed arrays or list vectors
function toVector(value: unknown): number[] {
  if (Array.isArray(value)) return value.map(Number)
  if (value instanceof Float32Array || value instanceof Float64Array) return Array.from(value)
  if (typeof value === 'object' && value !== null && 'toArray' in value && typeof value.toArray === 'function') {
    return toVector(value.toArray())
  }
  throw new StorageError('Unreadable vector column in documents table')
}

/** Snapshot store for the document corpus. Each save replaces the previous snapshot. */
export class LanceStorage {
  private connection: Promise<lancedb.Connection>

  constructor(config: Config) {
    const lanceDir = join(config.dataDir, 'lancedb')
    mkdirSync(lanceDir, { recursive: true })
    this.connection = lancedb.connect(lanceDir)
  }

  async saveDocuments(records: DocumentRecord[]): Promise<number> {
    const db = await this.connection
    try {
      if (records.length === 0) {
        if ((await db.tableNames()).includes(DOCUMENTS_TABLE)) await db.dropTable(DOCUMENTS_TABLE)
        return 0
      }
      const rows = records.map(r => ({
        id: r.id,
        vector: r.vector,
        text: r.text,
        source: r.source,
        metadata: JSON.stringify(r.metadata),
      }))
      await db.createTable(DOCUMENTS_TABLE, rows, { mode: 'overwrite' })
      return rows.length
    } catch (err) {
      throw new StorageError(`Failed to save ${records.length} documents`, err)
    }
  }

  async loadDocuments(): Promise<DocumentRecord[]> {
    const db = await this.connection
    if (!(await db.tableNames()).includes(DOCUMENTS_TABLE)) return []
    const table = await db.openTable(DOCUMENTS_TABLE)
    const count = await table.countRows()
    if (count === 0) return []
    const rows = await table.query().limit(count).toArray()

    return rows.map(raw => {
      const result = documentRowSchema.safeParse(raw)
      if (!result.success) {
        throw new StorageError(`Malformed document row: ${result.error.message}`, result.error)
      }
      const row = result.data
      let metadata: unknown
      try {
        metadata = JSON.parse(row.metadata)
      } catch (err) {
        throw new StorageError(`Malformed metadata in document ${row.id}`, err)
      }
      return {
        id: row.id,
        vector: toVector(row.vector),
        text: row.text,
        source: row.source,
        metadata: metadataSchema.parse(metadata),
      }
    })
  }

  async count(): Promise<number> {
    const db = await this.connection
    if (!(await db.tableNames()).includes(DOCUMENTS_TABLE)) return 0
    const table = await db.openTable(DOCUMENTS_TABLE)
    return await table.countRows()
  }
}
