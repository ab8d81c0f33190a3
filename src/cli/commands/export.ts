import type { Config } from '../../core/config.js'
import { openRuntime } from '../runtime.js'

export async function runExport(config: Config, path: string, sessionId?: string): Promise<number> {
  const runtime = await openRuntime(config)

  try {
    const count = await runtime.store.export(path, { sessionId })
    console.log(`Exported ${count} events to ${path}`)
    return count
  } finally {
    runtime.close()
  }
}
