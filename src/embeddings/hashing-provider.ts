import type { EmbeddingProvider } from '../core/types.js'
import { EmbeddingError } from '../core/errors.js'
import { tokenize } from '../utils/text.js'

const FNV_OFFSET_BASIS = 0x811c9dc5
const FNV_PRIME = 0x01000193

const encoder = new TextEncoder()

/** 32-bit FNV-1a over the UTF-8 bytes of `text`. */
export function fnv1a(text: string): number {
  let hash = FNV_OFFSET_BASIS
  for (const byte of encoder.encode(text)) {
    hash ^= byte
    hash = Math.imul(hash, FNV_PRIME) >>> 0
  }
  return hash
}

/**
 * Term-frequency vector with hashed buckets. Each bucket holds the share of
 * tokens that hash into it, so the vector of a non-empty text sums to 1.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  private dims: number

  constructor(dimensions: number = 384) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new EmbeddingError(`Embedding dimensions must be a positive integer, got ${dimensions}`)
    }
    this.dims = dimensions
  }

  embedSync(text: string): number[] {
    const vector = new Array<number>(this.dims).fill(0)
    const tokens = tokenize(text)
    if (tokens.length === 0) return vector
    for (const token of tokens) {
      vector[fnv1a(token) % this.dims] += 1
    }
    for (let i = 0; i < vector.length; i++) {
      vector[i] /= tokens.length
    }
    return vector
  }

  async embed(text: string): Promise<number[]> {
    return this.embedSync(text)
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map(t => this.embedSync(t))
  }

  dimensions(): number {
    return this.dims
  }
}
