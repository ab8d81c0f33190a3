import type { Config } from '../../core/config.js'
import { stateKeys } from '../../core/constants.js'
import type { MemoryStats } from '../../core/types.js'
import { openRuntime } from '../runtime.js'

function sessionLines(stats: MemoryStats): string[] {
  const kinds = Object.entries(stats.counts_by_kind)
    .map(([kind, count]) => `${kind}=${count}`)
    .join(' ')
  return [
    `\nSession ${stats.session_id}`,
    '='.repeat(8 + stats.session_id.length),
    `Entries:          ${stats.total_entries}`,
    `By Kind:          ${kinds}`,
    `Mean Importance:  ${stats.mean_importance.toFixed(3)}`,
    `Duration:         ${(stats.session_duration_ms / 1000).toFixed(1)}s`,
    `Created:          ${stats.created_at ?? 'never'}`,
    `Last Active:      ${stats.last_active_at ?? 'never'}`,
    `Long-term Memory: ${stats.long_term_count}/${stats.long_term_capacity}`,
  ]
}

export async function runStatus(config: Config, sessionId?: string): Promise<void> {
  const runtime = await openRuntime(config)

  try {
    const lines = sessionId !== undefined
      ? sessionLines(runtime.store.stats(sessionId))
      : [
          '\nAgent Recall Status',
          '===================',
          `Sessions:         ${runtime.store.sessionIds().length}`,
          `Long-term Memory: ${runtime.store.longTermSize}/${config.longTermCapacity}`,
          `Documents:        ${await runtime.lance.count()}`,
          `Last Compaction:  ${runtime.sqlite.getState(stateKeys.lastCompactionAt) ?? 'never'}`,
        ]
    for (const line of lines) console.log(line)
    console.log()
  } finally {
    runtime.close()
  }
}
