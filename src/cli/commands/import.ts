import type { Config } from '../../core/config.js'
import { openRuntime } from '../runtime.js'

export async function runImport(config: Config, path: string): Promise<number> {
  const runtime = await openRuntime(config)

  try {
    const count = await runtime.store.import(path)
    console.log(`Imported ${count} new events from ${path}`)
    return count
  } finally {
    runtime.close()
  }
}
