import type { Config } from '../core/config.js'
import type { EmbeddingProvider, Generator } from '../core/types.js'
import { createEmbeddingProvider } from '../embeddings/provider.js'
import { AnthropicGenerator } from '../llm/anthropic.js'
import { MemoryStore } from '../memory/store.js'
import { DocumentCorpus } from '../rag/corpus.js'
import { RagEngine } from '../rag/engine.js'
import { LanceStorage } from '../storage/lance.js'
import { SqliteStorage } from '../storage/sqlite.js'
import { logger } from '../utils/logger.js'
import { VectorIndex } from '../vector/vector-index.js'

export interface Runtime {
  config: Config
  sqlite: SqliteStorage
  lance: LanceStorage
  embeddings: EmbeddingProvider
  index: VectorIndex
  store: MemoryStore
  corpus: DocumentCorpus
  generator: AnthropicGenerator
  rag: RagEngine
  close(): void
}

export interface RuntimeOptions {
  /** Load the document snapshot into the index. */
  documents?: boolean
  generator?: Generator
}

/** Opens storage and restores long-term memory (and optionally the corpus) into one shared index. */
export async function openRuntime(config: Config, options: RuntimeOptions = {}): Promise<Runtime> {
  const sqlite = new SqliteStorage(config)
  const lance = new LanceStorage(config)
  const embeddings = createEmbeddingProvider(config)
  const index = new VectorIndex(embeddings)
  const store = new MemoryStore(sqlite, index, embeddings, config)
  const corpus = new DocumentCorpus(index, embeddings)
  const generator = new AnthropicGenerator(config)
  const rag = new RagEngine(index, embeddings, options.generator ?? generator, config)

  try {
    const restored = await store.restore()
    const documents = options.documents ? await corpus.load(lance) : 0
    logger.debug(`Restored ${restored} long-term entries and ${documents} documents`)
  } catch (err) {
    sqlite.close()
    throw err
  }

  return {
    config,
    sqlite,
    lance,
    embeddings,
    index,
    store,
    corpus,
    generator,
    rag,
    close() {
      try {
        store.flush()
      } finally {
        sqlite.close()
      }
    },
  }
}
