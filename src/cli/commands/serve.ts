import type { Config } from '../../core/config.js'
import { BackgroundScheduler } from '../../background/scheduler.js'
import { startMcpServer } from '../../mcp/server.js'
import { logger } from '../../utils/logger.js'
import { openRuntime } from '../runtime.js'

export async function runServe(config: Config): Promise<void> {
  logger.info('Starting Agent Recall MCP server...')

  const runtime = await openRuntime(config, { documents: true })

  logger.info(`Data directory: ${config.dataDir}`)
  logger.info(`Long-term memory: ${runtime.store.longTermSize}/${config.longTermCapacity} entries`)
  logger.info(`Documents: ${runtime.corpus.count()} chunks from ${runtime.corpus.sources().length} sources`)
  logger.info(`Flush policy: ${config.flushPolicy}`)
  logger.info(`Generation: ${runtime.generator.enabled ? config.generationModel : 'disabled (no API key)'}`)

  const scheduler = new BackgroundScheduler(runtime.store, config)
  scheduler.start()

  const server = await startMcpServer(runtime.store, runtime.rag)

  const shutdown = async (): Promise<void> => {
    scheduler.stop()
    const timeout = setTimeout(() => process.exit(1), 5000)
    try {
      await server.close()
      runtime.close()
    } catch (err) {
      logger.error('Shutdown failed', err)
      process.exitCode = 1
    } finally {
      clearTimeout(timeout)
      process.exit()
    }
  }

  process.on('SIGINT', () => void shutdown())
  process.on('SIGTERM', () => void shutdown())
}
