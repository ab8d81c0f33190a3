import type { Config } from '../../core/config.js'
import type { DocumentFormat } from '../../rag/loaders.js'
import { loadDocuments, splitDocuments } from '../../rag/loaders.js'
import { logger } from '../../utils/logger.js'
import { openRuntime } from '../runtime.js'

export interface IngestOptions {
  format?: DocumentFormat
  signal?: AbortSignal
}

/** Loads, chunks and indexes documents, replacing earlier chunks of the same sources, then saves the snapshot. */
export async function runIngest(config: Config, path: string, options: IngestOptions = {}): Promise<number> {
  const runtime = await openRuntime(config, { documents: true })

  try {
    const documents = await loadDocuments(path, options.format ?? 'auto', { signal: options.signal })
    const chunks = splitDocuments(documents, config.chunkSize, config.chunkOverlap)

    let replaced = 0
    for (const source of new Set(chunks.map(c => c.source))) {
      replaced += runtime.corpus.removeSource(source)
    }
    if (replaced > 0) logger.info(`Replacing ${replaced} previously ingested chunks`)

    const ids = await runtime.corpus.add(chunks, { signal: options.signal })
    await runtime.corpus.save(runtime.lance)

    console.log(`Ingested ${documents.length} documents as ${ids.length} chunks (${runtime.corpus.count()} in corpus)`)
    return ids.length
  } finally {
    runtime.close()
  }
}
