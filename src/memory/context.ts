import type { MemoryEvent, ScoredEvent } from '../core/types.js'

/** `HH:MM:SS` of an ISO-8601 UTC timestamp. */
export function formatClock(timestamp: string): string {
  return timestamp.slice(11, 19)
}

export function renderContext(history: MemoryEvent[], related: ScoredEvent[]): string {
  const lines = ['## Conversation history']
  if (history.length === 0) {
    lines.push('(no events)')
  }
  for (const event of history) {
    lines.push(`[${formatClock(event.timestamp)}] ${event.kind}: ${event.content}`)
  }

  if (related.length > 0) {
    lines.push('', '## Related memories')
    for (const hit of related) {
      lines.push(`- (${hit.event.kind}, importance ${hit.event.importance}) ${hit.event.content}`)
    }
  }
  return lines.join('\n')
}
