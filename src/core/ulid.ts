import { incrementBase32, monotonicFactory } from 'ulid'

const nextUlid = monotonicFactory()

// Monotonic: ids created later in this process always sort after earlier ones
export function generateIdAt(timestamp: number): string {
  return nextUlid(timestamp)
}

/**
 * Id for `timestamp` that sorts after `previous`, which may come from another
 * process or an import.
 */
export function generateIdAfter(timestamp: number, previous: string | undefined): string {
  const id = generateIdAt(timestamp)
  if (previous === undefined || id > previous) return id
  return incrementBase32(previous)
}
