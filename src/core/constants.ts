import type { EventKind } from './types.js'

export const EVENT_KINDS: readonly EventKind[] = ['task', 'thought', 'action', 'observation', 'answer']

export const namespaces = {
  memory: 'memory',
  document: 'document',
} as const

export const EXPORT_FORMAT = 'agent-recall-export'
export const EXPORT_VERSION = 1

export const stateKeys = {
  lastCompactionAt: 'last_compaction_at',
}
