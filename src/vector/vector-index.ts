import { EmbeddingError } from '../core/errors.js'
import type { EmbeddingProvider, IndexHit, MetadataFilter } from '../core/types.js'
import { cosineSimilarity, dotProduct } from '../embeddings/provider.js'
import { logger } from '../utils/logger.js'
import { assertPositiveInt } from '../utils/validation.js'

const log = logger.child('vector-index')

export type Metric = 'cosine' | 'dot'

export interface IndexRecord {
  id: string
  vector: number[]
  text: string
  metadata: Record<string, unknown>
}

export interface VectorIndexOptions {
  metric?: Metric
}

export function matchesFilter(metadata: Record<string, unknown>, filter?: MetadataFilter): boolean {
  if (!filter) return true
  if (typeof filter === 'function') return filter(metadata)
  return Object.entries(filter).every(([key, value]) => metadata[key] === value)
}

/**
 * Exact nearest-neighbour index held in memory. Records keep their first
 * insertion position across upserts, which is also the tie-break order.
 */
export class VectorIndex {
  private records = new Map<string, IndexRecord>()
  readonly metric: Metric

  constructor(
    private embeddings: EmbeddingProvider,
    options: VectorIndexOptions = {},
  ) {
    this.metric = options.metric ?? 'cosine'
  }

  get size(): number {
    return this.records.size
  }

  dimensions(): number {
    return this.embeddings.dimensions()
  }

  async insert(id: string, text: string, metadata: Record<string, unknown> = {}): Promise<IndexRecord> {
    const vector = await this.embeddings.embed(text)
    return this.put(id, vector, text, metadata)
  }

  put(id: string, vector: number[], text: string, metadata: Record<string, unknown> = {}): IndexRecord {
    this.assertDimensions(vector)
    const record: IndexRecord = { id, vector, text, metadata }
    // Map.set on an existing key keeps its position
    this.records.set(id, record)
    return record
  }

  delete(id: string): boolean {
    return this.records.delete(id)
  }

  deleteWhere(filter: MetadataFilter): number {
    let removed = 0
    for (const record of [...this.records.values()]) {
      if (matchesFilter(record.metadata, filter)) {
        this.records.delete(record.id)
        removed++
      }
    }
    if (removed > 0) log.debug(`Removed ${removed} records`)
    return removed
  }

  has(id: string): boolean {
    return this.records.has(id)
  }

  get(id: string): IndexRecord | null {
    return this.records.get(id) ?? null
  }

  entries(filter?: MetadataFilter): IndexRecord[] {
    return [...this.records.values()].filter(r => matchesFilter(r.metadata, filter))
  }

  clear(): void {
    this.records.clear()
  }

  async query(input: string | number[], k: number, filter?: MetadataFilter): Promise<IndexHit[]> {
    assertPositiveInt('k', k)
    if (this.records.size === 0) return []
    const vector = typeof input === 'string' ? await this.embeddings.embed(input) : input
    return this.search(vector, k, filter)
  }

  search(vector: number[], k: number, filter?: MetadataFilter): IndexHit[] {
    assertPositiveInt('k', k)
    if (this.records.size === 0) return []
    this.assertDimensions(vector)

    const score = this.metric === 'dot' ? dotProduct : cosineSimilarity
    const hits: IndexHit[] = []
    for (const record of this.records.values()) {
      if (!matchesFilter(record.metadata, filter)) continue
      hits.push({
        id: record.id,
        score: score(vector, record.vector),
        text: record.text,
        metadata: record.metadata,
      })
    }
    // Array.prototype.sort is stable: equal scores keep insertion order
    hits.sort((a, b) => b.score - a.score)
    return hits.slice(0, k)
  }

  private assertDimensions(vector: number[]): void {
    const expected = this.embeddings.dimensions()
    if (vector.length !== expected) {
      throw new EmbeddingError(`Vector dimension mismatch: expected ${expected}, got ${vector.length}`)
    }
  }
}
