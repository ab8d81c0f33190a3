import type { Config } from '../core/config.js'
import type { EmbeddingProvider } from '../core/types.js'
import { EmbeddingError } from '../core/errors.js'
import { HashingEmbeddingProvider } from './hashing-provider.js'

export type { EmbeddingProvider }

function assertSameLength(a: number[], b: number[], op: string): void {
  if (a.length !== b.length) {
    throw new EmbeddingError(`Dimension mismatch in ${op}: ${a.length} vs ${b.length}`)
  }
}

export function dotProduct(a: number[], b: number[]): number {
  assertSameLength(a, b, 'dotProduct')
  let sum = 0
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i]
  }
  return sum
}

export function cosineSimilarity(a: number[], b: number[]): number {
  assertSameLength(a, b, 'cosineSimilarity')
  let dot = 0
  let normA = 0
  let normB = 0
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i]
    normA += a[i] * a[i]
    normB += b[i] * b[i]
  }
  const denominator = Math.sqrt(normA) * Math.sqrt(normB)
  if (denominator === 0) return 0
  // Rounding can push identical vectors a hair past 1
  return Math.min(1, Math.max(-1, dot / denominator))
}

export function createEmbeddingProvider(config: Config): EmbeddingProvider {
  return new HashingEmbeddingProvider(config.embeddingDimensions)
}
