import type { Config } from '../../core/config.js'
import { InvalidArgumentError } from '../../core/errors.js'
import { openRuntime } from '../runtime.js'

export interface ClearOptions {
  session?: string
  all?: boolean
  documents?: boolean
}

export async function runClear(config: Config, options: ClearOptions): Promise<number> {
  if (options.session === undefined && !options.all && !options.documents) {
    throw new InvalidArgumentError('Pass --session <id>, --all or --documents')
  }
  if (options.session !== undefined && options.all) {
    throw new InvalidArgumentError('Pass either --session or --all, not both')
  }

  const runtime = await openRuntime(config, { documents: options.documents })

  try {
    let removed = 0
    if (options.all) {
      removed += runtime.store.clear('all')
      console.log(`Cleared ${removed} events from all sessions`)
    } else if (options.session !== undefined) {
      removed += runtime.store.clear({ sessionId: options.session })
      console.log(`Cleared ${removed} events from session ${options.session}`)
    }
    if (options.documents) {
      const chunks = runtime.corpus.clear()
      await runtime.corpus.save(runtime.lance)
      console.log(`Cleared ${chunks} document chunks`)
      removed += chunks
    }
    return removed
  } finally {
    runtime.close()
  }
}
