import { existsSync, mkdirSync } from 'fs'
import { resolve } from 'path'
import { loadConfig } from '../../core/config.js'
import { SqliteStorage } from '../../storage/sqlite.js'
import { logger } from '../../utils/logger.js'

export function runInit(dataDir: string): void {
  const resolved = resolve(dataDir)

  if (existsSync(resolved)) {
    logger.info(`Data directory already exists: ${resolved}`)
  } else {
    mkdirSync(resolved, { recursive: true })
    logger.info(`Created data directory: ${resolved}`)
  }

  const lanceDir = resolve(resolved, 'lancedb')
  if (!existsSync(lanceDir)) {
    mkdirSync(lanceDir, { recursive: true })
  }

  // Opening the database creates the schema
  new SqliteStorage(loadConfig({ dataDir: resolved })).close()

  logger.info('Agent Recall initialized successfully')
  logger.info('Load documents with: agent-recall ingest <path>')
  logger.info('Start the MCP server with: agent-recall serve')
}
