import { config as loadDotenv } from 'dotenv'
import { resolve } from 'path'
import type { LogLevel } from '../utils/logger.js'
import { LOG_LEVELS, isLogLevel, logger } from '../utils/logger.js'

loadDotenv()

export type FlushPolicy = 'immediate' | 'batched'

export interface Config {
  dataDir: string
  promotionThreshold: number
  longTermCapacity: number
  hybridKeywordWeight: number
  hybridSemanticWeight: number
  relevanceFloor: number
  embeddingDimensions: number
  flushPolicy: FlushPolicy
  flushBatchSize: number
  flushInterval: number
  decayRate: number
  compactionInterval: number
  ragTopK: number
  ragRerank: boolean
  ragContextBudget: number
  chunkSize: number
  chunkOverlap: number
  anthropicApiKey: string | null
  generationModel: string
  generationMaxTokens: number
  generationTimeout: number
  logLevel: LogLevel
}

function envFloat(key: string, fallback: number): number {
  const val = process.env[key]
  if (val === undefined) return fallback
  const parsed = parseFloat(val)
  return isNaN(parsed) ? fallback : parsed
}

function envInt(key: string, fallback: number): number {
  const val = process.env[key]
  if (val === undefined) return fallback
  const parsed = parseInt(val, 10)
  return isNaN(parsed) ? fallback : parsed
}

function envString(key: string, fallback: string): string {
  return process.env[key] || fallback
}

function envBool(key: string, fallback: boolean): boolean {
  const val = process.env[key]?.trim().toLowerCase()
  if (!val) return fallback
  if (['1', 'true', 'yes', 'on'].includes(val)) return true
  if (['0', 'false', 'no', 'off'].includes(val)) return false
  return fallback
}

function envFlushPolicy(key: string, fallback: FlushPolicy): FlushPolicy {
  const val = process.env[key]
  return val === 'immediate' || val === 'batched' ? val : fallback
}

function envLogLevel(key: string, fallback: LogLevel): LogLevel {
  const val = process.env[key]
  return val && isLogLevel(val) ? val : fallback
}

export function loadConfig(overrides?: Partial<Config>): Config {
  const base: Config = {
    dataDir: resolve(envString('DATA_DIR', './data')),
    promotionThreshold: envFloat('PROMOTION_THRESHOLD', 0.5),
    longTermCapacity: envInt('LONG_TERM_CAPACITY', 1000),
    hybridKeywordWeight: envFloat('HYBRID_KEYWORD_WEIGHT', 0.5),
    hybridSemanticWeight: envFloat('HYBRID_SEMANTIC_WEIGHT', 0.5),
    relevanceFloor: envFloat('RELEVANCE_FLOOR', 0),
    embeddingDimensions: envInt('EMBEDDING_DIMENSIONS', 384),
    flushPolicy: envFlushPolicy('FLUSH_POLICY', 'immediate'),
    flushBatchSize: envInt('FLUSH_BATCH_SIZE', 16),
    flushInterval: envInt('FLUSH_INTERVAL', 5000),
    decayRate: envFloat('DECAY_RATE', 1),
    compactionInterval: envInt('COMPACTION_INTERVAL', 3600000),
    ragTopK: envInt('RAG_TOP_K', 5),
    ragRerank: envBool('RAG_RERANK', true),
    ragContextBudget: envInt('RAG_CONTEXT_BUDGET', 4000),
    chunkSize: envInt('CHUNK_SIZE', 1000),
    chunkOverlap: envInt('CHUNK_OVERLAP', 200),
    anthropicApiKey: process.env['ANTHROPIC_API_KEY'] || null,
    generationModel: envString('GENERATION_MODEL', 'claude-haiku-4-5-20251001'),
    generationMaxTokens: envInt('GENERATION_MAX_TOKENS', 1024),
    generationTimeout: envInt('GENERATION_TIMEOUT', 60000),
    logLevel: envLogLevel('LOG_LEVEL', 'info'),
  }

  if (overrides) {
    Object.assign(base, Object.fromEntries(
      Object.entries(overrides).filter(([, v]) => v !== undefined),
    ))
  }

  validateConfig(base)
  return base
}

function validateConfig(config: Config): void {
  const errors: string[] = []

  if (!config.dataDir || config.dataDir.includes('\0')) {
    errors.push('dataDir must be a non-empty path without null bytes')
  }

  if (config.promotionThreshold < 0 || config.promotionThreshold > 1) {
    errors.push(`promotionThreshold must be in [0, 1], got ${config.promotionThreshold}`)
  }
  if (!Number.isInteger(config.longTermCapacity) || config.longTermCapacity <= 0) {
    errors.push(`longTermCapacity must be a positive integer, got ${config.longTermCapacity}`)
  }
  if (config.hybridKeywordWeight < 0) {
    errors.push(`hybridKeywordWeight must be >= 0, got ${config.hybridKeywordWeight}`)
  }
  if (config.hybridSemanticWeight < 0) {
    errors.push(`hybridSemanticWeight must be >= 0, got ${config.hybridSemanticWeight}`)
  }
  if (config.relevanceFloor < -1 || config.relevanceFloor > 1) {
    errors.push(`relevanceFloor must be in [-1, 1], got ${config.relevanceFloor}`)
  }
  if (config.embeddingDimensions <= 0) {
    errors.push(`embeddingDimensions must be > 0, got ${config.embeddingDimensions}`)
  }
  if (config.flushPolicy !== 'immediate' && config.flushPolicy !== 'batched') {
    errors.push(`flushPolicy must be one of immediate, batched, got ${config.flushPolicy}`)
  }
  if (config.flushBatchSize <= 0) {
    errors.push(`flushBatchSize must be > 0, got ${config.flushBatchSize}`)
  }
  if (config.flushInterval <= 0) {
    errors.push(`flushInterval must be > 0, got ${config.flushInterval}`)
  }
  if (config.decayRate <= 0 || config.decayRate > 1) {
    errors.push(`decayRate must be in (0, 1], got ${config.decayRate}`)
  }
  if (config.compactionInterval <= 0) {
    errors.push(`compactionInterval must be > 0, got ${config.compactionInterval}`)
  }
  if (config.ragTopK <= 0) {
    errors.push(`ragTopK must be > 0, got ${config.ragTopK}`)
  }
  if (config.ragContextBudget <= 0) {
    errors.push(`ragContextBudget must be > 0, got ${config.ragContextBudget}`)
  }
  if (config.chunkSize <= 0) {
    errors.push(`chunkSize must be > 0, got ${config.chunkSize}`)
  }
  if (config.chunkOverlap < 0 || config.chunkOverlap >= config.chunkSize) {
    errors.push(`chunkOverlap must be in [0, chunkSize), got ${config.chunkOverlap}`)
  }
  if (!config.generationModel) {
    errors.push('generationModel must be a non-empty string')
  }
  if (config.generationMaxTokens <= 0) {
    errors.push(`generationMaxTokens must be > 0, got ${config.generationMaxTokens}`)
  }
  if (config.generationTimeout <= 0) {
    errors.push(`generationTimeout must be > 0, got ${config.generationTimeout}`)
  }
  if (!isLogLevel(config.logLevel)) {
    errors.push(`logLevel must be one of ${LOG_LEVELS.join(', ')}, got ${config.logLevel}`)
  }

  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n  - ${errors.join('\n  - ')}`)
  }

  const weightSum = config.hybridKeywordWeight + config.hybridSemanticWeight
  if (Math.abs(weightSum - 1.0) > 0.01) {
    logger.warn(`Hybrid search weights sum to ${weightSum.toFixed(3)} instead of 1.0. Combined scores may exceed 1.`)
  }
}
