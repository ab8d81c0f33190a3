import type { Config } from '../../core/config.js'
import type { Generator, RagResult } from '../../core/types.js'
import { openRuntime } from '../runtime.js'

export interface AskOptions {
  k?: number
  rerank?: boolean
  generator?: Generator
}

export async function runAsk(config: Config, question: string, options: AskOptions = {}): Promise<RagResult> {
  const runtime = await openRuntime(config, { documents: true, generator: options.generator })

  try {
    const result = await runtime.rag.query(question, { k: options.k, rerank: options.rerank })
    if (result.status === 'failed') {
      console.error(`Could not answer (${result.reason}): ${result.message}`)
      process.exitCode = 1
      return result
    }

    console.log(`\n${result.answer}\n`)
    console.log(`Confidence: ${result.confidence.toFixed(3)}`)
    result.sources.forEach((source, i) => {
      console.log(`  [${i + 1}] ${source.source} (similarity ${source.similarity.toFixed(3)})`)
    })
    console.log()
    return result
  } finally {
    runtime.close()
  }
}
