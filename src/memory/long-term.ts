import { namespaces } from '../core/constants.js'
import { EmbeddingError, InvalidArgumentError } from '../core/errors.js'
import type { MemoryEvent } from '../core/types.js'
import { logger } from '../utils/logger.js'
import { assertPositiveInt } from '../utils/validation.js'
import type { VectorIndex } from '../vector/vector-index.js'

const log = logger.child('long-term')

export interface AdmitResult {
  admitted: boolean
  evicted: MemoryEvent | null
}

/** Negative when `a` should be evicted before `b`. */
export function compareForEviction(a: MemoryEvent, b: MemoryEvent): number {
  if (a.importance !== b.importance) return a.importance - b.importance
  if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1
  if (a.id !== b.id) return a.id < b.id ? -1 : 1
  return 0
}

/**
 * Bounded cross-session store. Every method is synchronous so that an
 * admission, its eviction and the matching index updates land together.
 */
export class LongTermStore {
  private entries = new Map<string, MemoryEvent>()

  constructor(
    private index: VectorIndex,
    readonly capacity: number,
  ) {
    assertPositiveInt('capacity', capacity)
  }

  get size(): number {
    return this.entries.size
  }

  has(id: string): boolean {
    return this.entries.has(id)
  }

  get(id: string): MemoryEvent | null {
    return this.entries.get(id) ?? null
  }

  values(): MemoryEvent[] {
    return [...this.entries.values()]
  }

  admit(event: MemoryEvent): AdmitResult {
    const embedding = event.embedding
    if (embedding === null) {
      throw new InvalidArgumentError(`Long-term entry ${event.id} has no embedding`)
    }
    if (embedding.length !== this.index.dimensions()) {
      throw new EmbeddingError(
        `Long-term entry ${event.id} has dimension ${embedding.length}, index expects ${this.index.dimensions()}`,
      )
    }

    let evicted: MemoryEvent | null = null
    if (!this.entries.has(event.id) && this.entries.size >= this.capacity) {
      let lowest = event
      for (const candidate of this.entries.values()) {
        if (compareForEviction(candidate, lowest) < 0) lowest = candidate
      }
      if (lowest === event) {
        log.debug(`Event ${event.id} ranks lowest at capacity, not admitted`)
        return { admitted: false, evicted: null }
      }
      this.remove(lowest.id)
      evicted = lowest
    }

    this.index.put(event.id, embedding, event.content, {
      namespace: namespaces.memory,
      session_id: event.session_id,
      kind: event.kind,
    })
    this.entries.set(event.id, event)
    if (evicted) log.debug(`Evicted ${evicted.id} (importance ${evicted.importance}) for ${event.id}`)
    return { admitted: true, evicted }
  }

  remove(id: string): MemoryEvent | null {
    const entry = this.entries.get(id)
    if (!entry) return null
    this.entries.delete(id)
    this.index.delete(id)
    return entry
  }

  clear(): number {
    const removed = this.entries.size
    this.entries.clear()
    this.index.deleteWhere({ namespace: namespaces.memory })
    return removed
  }
}
