import { Command, InvalidArgumentError as CommanderArgumentError } from 'commander'
import { resolve } from 'path'
import type { Config } from '../core/config.js'
import { loadConfig } from '../core/config.js'
import { AgentRecallError } from '../core/errors.js'
import { isDocumentFormat } from '../rag/loaders.js'
import type { DocumentFormat } from '../rag/loaders.js'
import type { LogLevel } from '../utils/logger.js'
import { LOG_LEVELS, isLogLevel, logger, setLogLevel } from '../utils/logger.js'

interface CommonOptions {
  dataDir?: string
  logLevel?: LogLevel
}

function configFrom(opts: CommonOptions): Config {
  const config = loadConfig({
    dataDir: opts.dataDir === undefined ? undefined : resolve(opts.dataDir),
    logLevel: opts.logLevel,
  })
  setLogLevel(config.logLevel)
  return config
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) throw new CommanderArgumentError(`Expected one of ${LOG_LEVELS.join(', ')}`)
  return value
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) throw new CommanderArgumentError('Expected a positive integer')
  return parsed
}

function parseFormat(value: string): DocumentFormat {
  if (!isDocumentFormat(value)) throw new CommanderArgumentError('Expected auto, text, markdown, json or directory')
  return value
}

/** Reports domain errors as one line and a non-zero exit code. */
async function run(fn: () => Promise<unknown>): Promise<void> {
  try {
    await fn()
  } catch (err) {
    if (!(err instanceof AgentRecallError)) throw err
    logger.error(`${err.code}: ${err.message}`)
    process.exitCode = 1
  }
}

export function createCli(): Command {
  const program = new Command()

  program
    .name('agent-recall')
    .description('Two-tier agent memory and document question answering over MCP')
    .version('0.1.0')

  program
    .command('init')
    .description('Initialize the data directory and database')
    .option('-d, --data-dir <path>', 'Data directory path', './data')
    .action(async (opts: { dataDir: string }) => {
      const { runInit } = await import('./commands/init.js')
      runInit(opts.dataDir)
    })

  program
    .command('serve')
    .description('Start the Agent Recall MCP server (stdio transport)')
    .option('-d, --data-dir <path>', 'Data directory path')
    .option('--log-level <level>', 'Log level (debug, info, warn, error)', parseLogLevel)
    .action(async (opts: CommonOptions) => run(async () => {
      const { runServe } = await import('./commands/serve.js')
      await runServe(configFrom(opts))
    }))

  program
    .command('status')
    .description('Show memory statistics, or one session\'s statistics')
    .option('-s, --session <id>', 'Session identifier')
    .option('-d, --data-dir <path>', 'Data directory path')
    .action(async (opts: CommonOptions & { session?: string }) => run(async () => {
      const { runStatus } = await import('./commands/status.js')
      await runStatus(configFrom(opts), opts.session)
    }))

  program
    .command('ingest <path>')
    .description('Load, chunk and index documents, then save the corpus snapshot')
    .option('-f, --format <format>', 'auto, text, markdown, json or directory', parseFormat, 'auto')
    .option('-d, --data-dir <path>', 'Data directory path')
    .option('--log-level <level>', 'Log level (debug, info, warn, error)', parseLogLevel)
    .action(async (path: string, opts: CommonOptions & { format: DocumentFormat }) => run(async () => {
      const { runIngest } = await import('./commands/ingest.js')
      const controller = new AbortController()
      const abort = (): void => controller.abort()
      process.once('SIGINT', abort)
      try {
        await runIngest(configFrom(opts), path, { format: opts.format, signal: controller.signal })
      } finally {
        process.off('SIGINT', abort)
      }
    }))

  program
    .command('ask <question...>')
    .description('Answer a question from the ingested documents (needs ANTHROPIC_API_KEY)')
    .option('-k, --top-k <n>', 'Passages to retrieve', parsePositiveInt)
    .option('--no-rerank', 'Keep retrieval order')
    .option('-d, --data-dir <path>', 'Data directory path')
    .action(async (words: string[], opts: CommonOptions & { topK?: number; rerank: boolean }) => run(async () => {
      const { runAsk } = await import('./commands/ask.js')
      await runAsk(configFrom(opts), words.join(' '), { k: opts.topK, rerank: opts.rerank })
    }))

  program
    .command('export <file>')
    .description('Write sessions and long-term memory to a JSON file')
    .option('-s, --session <id>', 'Export only this session')
    .option('-d, --data-dir <path>', 'Data directory path')
    .action(async (file: string, opts: CommonOptions & { session?: string }) => run(async () => {
      const { runExport } = await import('./commands/export.js')
      await runExport(configFrom(opts), file, opts.session)
    }))

  program
    .command('import <file>')
    .description('Merge an export file into memory')
    .option('-d, --data-dir <path>', 'Data directory path')
    .action(async (file: string, opts: CommonOptions) => run(async () => {
      const { runImport } = await import('./commands/import.js')
      await runImport(configFrom(opts), file)
    }))

  program
    .command('clear')
    .description('Delete a session, all memory, or the document corpus')
    .option('-s, --session <id>', 'Session to clear')
    .option('-a, --all', 'Clear every session and long-term memory')
    .option('--documents', 'Clear the document corpus')
    .option('-d, --data-dir <path>', 'Data directory path')
    .action(async (opts: CommonOptions & { session?: string; all?: boolean; documents?: boolean }) => run(async () => {
      const { runClear } = await import('./commands/clear.js')
      await runClear(configFrom(opts), opts)
    }))

  return program
}
