import { namespaces } from '../core/constants.js'
import { EmbeddingError } from '../core/errors.js'
import type { Document, EmbeddingProvider } from '../core/types.js'
import type { DocumentRecord, LanceStorage } from '../storage/lance.js'
import { logger } from '../utils/logger.js'
import type { IndexRecord, VectorIndex } from '../vector/vector-index.js'

const log = logger.child('corpus')

export interface AddOptions {
  signal?: AbortSignal
}

function sourceOf(record: IndexRecord): string {
  const source = record.metadata.source
  return typeof source === 'string' ? source : ''
}

/** Owns the `document` namespace of the shared vector index. */
export class DocumentCorpus {
  constructor(
    private index: VectorIndex,
    private embeddings: EmbeddingProvider,
  ) {}

  /** Embeds and indexes each document; ids default to `doc:<source>#<n>`. */
  async add(documents: Document[], options: AddOptions = {}): Promise<string[]> {
    const ids: string[] = []
    for (const doc of documents) {
      options.signal?.throwIfAborted()
      let vector: number[]
      try {
        vector = await this.embeddings.embed(doc.content)
      } catch (err) {
        throw err instanceof EmbeddingError ? err : new EmbeddingError(`Failed to embed document from ${doc.source}`, err)
      }
      const id = doc.id ?? `doc:${doc.source}#${this.nextOrdinal(doc.source)}`
      this.index.put(id, vector, doc.content, { ...doc.metadata, namespace: namespaces.document, source: doc.source })
      ids.push(id)
    }
    if (ids.length > 0) log.info(`Indexed ${ids.length} documents`)
    return ids
  }

  removeSource(source: string): number {
    return this.index.deleteWhere(m => m.namespace === namespaces.document && m.source === source)
  }

  clear(): number {
    return this.index.deleteWhere({ namespace: namespaces.document })
  }

  count(): number {
    return this.index.entries({ namespace: namespaces.document }).length
  }

  sources(): string[] {
    const seen = new Set(this.index.entries({ namespace: namespaces.document }).map(sourceOf))
    return [...seen].sort()
  }

  async save(lance: LanceStorage): Promise<number> {
    const records: DocumentRecord[] = this.index.entries({ namespace: namespaces.document }).map(record => {
      const { namespace: _namespace, source: _source, ...metadata } = record.metadata
      return { id: record.id, vector: record.vector, text: record.text, source: sourceOf(record), metadata }
    })
    const saved = await lance.saveDocuments(records)
    log.info(`Saved ${saved} documents to the corpus snapshot`)
    return saved
  }

  /** Replaces the indexed corpus with the snapshot; vectors of another dimension are re-embedded. */
  async load(lance: LanceStorage): Promise<number> {
    const records = await lance.loadDocuments()
    const dims = this.embeddings.dimensions()
    const stale = records.filter(r => r.vector.length !== dims)
    const fresh = stale.length > 0 ? await this.embeddings.embedBatch(stale.map(r => r.text)) : []
    const replaced = new Map(stale.map((r, i) => [r.id, fresh[i]]))
    if (stale.length > 0) log.warn(`Re-embedded ${stale.length} documents with stale vectors`)

    this.clear()
    for (const record of records) {
      this.index.put(record.id, replaced.get(record.id) ?? record.vector, record.text, {
        ...record.metadata,
        namespace: namespaces.document,
        source: record.source,
      })
    }
    return records.length
  }

  private nextOrdinal(source: string): number {
    let n = this.index.entries({ namespace: namespaces.document, source }).length
    while (this.index.has(`doc:${source}#${n}`)) n++
    return n
  }
}
