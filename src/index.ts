export { loadConfig } from './core/config.js'
export type { Config, FlushPolicy } from './core/config.js'
export * from './core/errors.js'
export type * from './core/types.js'
export { EVENT_KINDS } from './core/constants.js'
export { createEmbeddingProvider, cosineSimilarity, dotProduct } from './embeddings/provider.js'
export { HashingEmbeddingProvider } from './embeddings/hashing-provider.js'
export { VectorIndex } from './vector/vector-index.js'
export type { IndexRecord, Metric, VectorIndexOptions } from './vector/vector-index.js'
export { MemoryStore } from './memory/store.js'
export type { BuildContextOptions, ClearTarget, CompactionResult, ExportOptions, MemoryStoreOptions } from './memory/store.js'
export { HeuristicScoringPolicy } from './memory/scoring.js'
export type { ScoringPolicy } from './memory/scoring.js'
export { DocumentCorpus } from './rag/corpus.js'
export { RagEngine } from './rag/engine.js'
export type { RagConfig, RagQueryOptions, RetrieveOptions } from './rag/engine.js'
export { loadDocuments, splitDocuments } from './rag/loaders.js'
export type { DocumentFormat, LoadOptions } from './rag/loaders.js'
export { AnthropicGenerator } from './llm/anthropic.js'
export { SqliteStorage } from './storage/sqlite.js'
export { LanceStorage } from './storage/lance.js'
export { BackgroundScheduler } from './background/scheduler.js'
export { createMcpServer, startMcpServer } from './mcp/server.js'
export { openRuntime } from './cli/runtime.js'
export type { Runtime } from './cli/runtime.js'
