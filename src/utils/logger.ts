export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

let currentLevel: LogLevel = 'info'

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS
}

function shouldLog(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[currentLevel]
}

export interface Logger {
  debug(msg: string, data?: unknown): void
  info(msg: string, data?: unknown): void
  warn(msg: string, data?: unknown): void
  error(msg: string, data?: unknown): void
  child(scope: string): Logger
}

// Everything goes to stderr: stdout carries the MCP stdio transport and CLI output
function createLogger(scope: string | null): Logger {
  const write = (level: LogLevel, msg: string, data: unknown): void => {
    if (!shouldLog(level)) return
    const prefix = scope ? `${level.toUpperCase()} [${scope}]` : level.toUpperCase()
    console.error(`[${new Date().toISOString()}] ${prefix}: ${msg}`, data !== undefined ? data : '')
  }

  return {
    debug: (msg, data) => write('debug', msg, data),
    info: (msg, data) => write('info', msg, data),
    warn: (msg, data) => write('warn', msg, data),
    error: (msg, data) => write('error', msg, data),
    child: (child) => createLogger(scope ? `${scope}:${child}` : child),
  }
}

export const logger = createLogger(null)
