import type { Config } from '../core/config.js'
import { namespaces } from '../core/constants.js'
import { EmbeddingError, GenerationTimeoutError, InvalidArgumentError } from '../core/errors.js'
import type {
  EmbeddingProvider,
  Generator,
  MetadataFilter,
  RagFailed,
  RagFailureReason,
  RagResult,
  RagStage,
  RetrievedChunk,
} from '../core/types.js'
import { logger } from '../utils/logger.js'
import { tokenOverlap } from '../utils/text.js'
import { assertPositiveInt } from '../utils/validation.js'
import { matchesFilter } from '../vector/vector-index.js'
import type { VectorIndex } from '../vector/vector-index.js'

const log = logger.child('rag')

export const RERANK_OVERLAP_WEIGHT = 0.3

export type RagConfig = Pick<Config, 'ragTopK' | 'ragRerank' | 'ragContextBudget' | 'relevanceFloor'>

export interface RetrieveOptions {
  k?: number
  filter?: MetadataFilter
  rerank?: boolean
}

export interface RagQueryOptions extends RetrieveOptions {
  maxTokens?: number
  temperature?: number
  signal?: AbortSignal
}

export function buildPrompt(question: string): string {
  return [
    'Answer the question using the numbered context passages, citing them as [n].',
    'If the context does not contain the answer, say that you do not know.',
    '',
    `Question: ${question}`,
  ].join('\n')
}

/**
 * Packs `[n] (source)` blocks in order while the joined text stays within
 * `budget` characters. A block that does not fit is skipped and later ones
 * are still tried.
 */
export function buildContext(chunks: RetrievedChunk[], budget: number): { context: string; included: RetrievedChunk[] } {
  const blocks: string[] = []
  const included: RetrievedChunk[] = []
  let length = 0
  for (const chunk of chunks) {
    const block = `[${blocks.length + 1}] (${chunk.source})\n${chunk.content}`
    const next = length + (blocks.length > 0 ? 2 : 0) + block.length
    if (next > budget) continue
    blocks.push(block)
    included.push(chunk)
    length = next
  }
  return { context: blocks.join('\n\n'), included }
}

export function rerank(question: string, chunks: RetrievedChunk[]): RetrievedChunk[] {
  return chunks
    .map(chunk => ({ ...chunk, score: chunk.similarity + RERANK_OVERLAP_WEIGHT * tokenOverlap(question, chunk.content) }))
    .sort((a, b) => b.score - a.score)
}

/** Question answering over the `document` namespace of the shared index. */
export class RagEngine {
  constructor(
    private index: VectorIndex,
    private embeddings: EmbeddingProvider,
    private generator: Generator,
    private config: RagConfig,
  ) {}

  get corpusSize(): number {
    return this.index.entries({ namespace: namespaces.document }).length
  }

  /** Retrieval and reranking without generation. */
  async retrieve(question: string, options: RetrieveOptions = {}): Promise<RetrievedChunk[]> {
    if (!question.trim()) throw new InvalidArgumentError('question must not be empty')
    const k = options.k ?? this.config.ragTopK
    assertPositiveInt('k', k)
    if (this.corpusSize === 0) return []

    let vector: number[]
    try {
      vector = await this.embeddings.embed(question)
    } catch (err) {
      throw err instanceof EmbeddingError ? err : new EmbeddingError('Failed to embed question', err)
    }
    const chunks = this.search(vector, k, options.filter)
    return options.rerank ?? this.config.ragRerank ? rerank(question, chunks) : chunks
  }

  /** Never throws: every failure comes back as a `failed` result with its reason. */
  async query(question: string, options: RagQueryOptions = {}): Promise<RagResult> {
    const stages: RagStage[] = ['received']
    const fail = (reason: RagFailureReason, message: string): RagFailed => {
      stages.push('failed')
      log.warn(`RAG query failed (${reason}): ${message}`)
      return { status: 'failed', question, reason, message, stages }
    }

    if (!question.trim()) return fail('invalid_question', 'question must not be empty')
    const k = options.k ?? this.config.ragTopK
    if (!Number.isInteger(k) || k <= 0) return fail('invalid_question', `k must be a positive integer, got ${k}`)
    if (options.signal?.aborted) return fail('cancelled', 'query cancelled before it started')
    if (this.corpusSize === 0) return fail('empty_corpus', 'no documents have been loaded')

    let chunks: RetrievedChunk[]
    try {
      const vector = await this.embeddings.embed(question)
      chunks = this.search(vector, k, options.filter)
    } catch (err) {
      return fail('embedding_failed', err instanceof Error ? err.message : String(err))
    }
    stages.push('retrieved')

    if (options.rerank ?? this.config.ragRerank) {
      chunks = rerank(question, chunks)
      stages.push('reranked')
    }

    const { context, included } = buildContext(chunks, this.config.ragContextBudget)
    stages.push('context_built')

    let answer: string
    try {
      answer = await this.generator.generate(buildPrompt(question), context, {
        maxTokens: options.maxTokens,
        temperature: options.temperature,
        signal: options.signal,
      })
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      if (options.signal?.aborted) return fail('cancelled', message)
      if (err instanceof GenerationTimeoutError) return fail('generation_timeout', message)
      return fail('generation_unavailable', message)
    }

    stages.push('answered')
    const confidence = chunks.length > 0 ? Math.max(...chunks.map(c => c.similarity)) : 0
    log.debug(`Answered from ${included.length} of ${chunks.length} chunks (confidence ${confidence.toFixed(3)})`)
    return { status: 'answered', question, answer, confidence, context, sources: included, stages }
  }

  /** Runs questions one after another; once the signal aborts, the rest come back as `cancelled`. */
  async batchQuery(questions: string[], options: RagQueryOptions = {}): Promise<RagResult[]> {
    const results: RagResult[] = []
    for (const question of questions) {
      if (options.signal?.aborted) {
        results.push({
          status: 'failed',
          question,
          reason: 'cancelled',
          message: 'batch cancelled before this question started',
          stages: ['received', 'failed'],
        })
        continue
      }
      results.push(await this.query(question, options))
    }
    return results
  }

  private search(vector: number[], k: number, filter?: MetadataFilter): RetrievedChunk[] {
    const inCorpus = (m: Record<string, unknown>): boolean =>
      m.namespace === namespaces.document && matchesFilter(m, filter)

    return this.index
      .search(vector, k, inCorpus)
      .filter(hit => hit.score > this.config.relevanceFloor)
      .map(hit => {
        const { namespace: _namespace, source, ...metadata } = hit.metadata
        return {
          id: hit.id,
          source: typeof source === 'string' ? source : '',
          content: hit.text,
          similarity: hit.score,
          score: hit.score,
          metadata,
        }
      })
  }
}
