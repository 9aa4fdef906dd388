/**
 * Structured JSONL logger.
 *
 * Every entry is written to stderr: stdout belongs to the checkpoint output
 * and must only ever carry state lines.
 */

import { serializeError } from 'serialize-error'
import { getRunId } from './run-context'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
export type LoggerType = 'protocol' | 'buffer' | 'sink' | 'cli'

/**
 * All available logger types for filtering
 */
const ALL_LOGGER_TYPES: readonly LoggerType[] = [
  'protocol',
  'buffer',
  'sink',
  'cli',
]

/**
 * Log level ordering for comparison (higher = more severe)
 */
const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

interface LogConfig {
  level: LogLevel
  enabledTypes: Set<LoggerType> | 'all'
}

/**
 * Cached log configuration (parsed once per process)
 */
let cachedLogConfig: LogConfig | null = null

function isLoggerType(value: string): value is LoggerType {
  return ALL_LOGGER_TYPES.some((type) => type === value)
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_ORDER
}

/**
 * Parse LOG_TYPES environment variable
 * Supports: "*" (all), "type1,type2" (include), "*,-type1,-type2" (exclude)
 */
export function parseLogTypes(
  typesStr: string | undefined,
): Set<LoggerType> | 'all' {
  if (!typesStr || typesStr === '*') return 'all'
  if (typesStr === 'none') return new Set()

  const tokens = typesStr.split(',').map((t) => t.trim())

  // Exclusion mode
  if (tokens[0] === '*') {
    const all = new Set<LoggerType>(ALL_LOGGER_TYPES)
    for (const token of tokens.slice(1)) {
      const type = token.slice(1)
      if (token.startsWith('-') && isLoggerType(type)) {
        all.delete(type)
      }
    }
    return all
  }

  const enabled = new Set<LoggerType>()
  for (const token of tokens) {
    if (isLoggerType(token)) {
      enabled.add(token)
    }
  }
  return enabled
}

function getLogConfig(): LogConfig {
  if (cachedLogConfig) return cachedLogConfig

  const rawLevel = process.env.LOG_LEVEL?.toLowerCase() ?? 'info'

  cachedLogConfig = {
    level: isLogLevel(rawLevel) ? rawLevel : 'info',
    enabledTypes: parseLogTypes(process.env.LOG_TYPES),
  }

  return cachedLogConfig
}

function shouldLog(level: LogLevel, loggerType?: LoggerType): boolean {
  const config = getLogConfig()

  if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[config.level]) {
    return false
  }

  if (config.enabledTypes !== 'all' && loggerType) {
    return config.enabledTypes.has(loggerType)
  }

  return true
}

/**
 * Reset cached log config (useful for testing)
 */
export function resetLogConfig(): void {
  cachedLogConfig = null
}

export interface LogContext {
  operation?: string
  stream?: string | null
  duration?: number
  [key: string]: unknown
}

interface LogEntry {
  timestamp: string
  level: LogLevel
  loggerType?: LoggerType
  runId?: string
  message: string
  context?: LogContext
}

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'authorization']

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase()
  return SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive))
}

/**
 * Sanitize sensitive data from objects before logging.
 * Converts Error instances to plain objects with stack traces preserved.
 * Converts BigInt values to strings for JSON serialization.
 */
export function sanitize(data: unknown, depth = 0): unknown {
  if (typeof data === 'bigint') {
    return data.toString() + 'n'
  }

  if (!data || typeof data !== 'object') {
    return data
  }

  if (depth > 5) return '[Max Depth Reached]'

  if (data instanceof Error) {
    return sanitize(serializeError(data), depth + 1)
  }

  if (Array.isArray(data)) {
    return data.map((item) => sanitize(item, depth + 1))
  }

  const sanitized: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(data)) {
    sanitized[key] = isSensitiveKey(key)
      ? '[REDACTED]'
      : sanitize(value, depth + 1)
  }
  return sanitized
}

function sanitizeContext(context: LogContext): LogContext {
  const sanitized: LogContext = {}
  for (const [key, value] of Object.entries(context)) {
    sanitized[key] = isSensitiveKey(key) ? '[REDACTED]' : sanitize(value, 1)
  }
  return sanitized
}

function mergeErrorIntoContext(
  context: LogContext | undefined,
  error: unknown,
): LogContext {
  return { ...context, error }
}

export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  loggerType?: LoggerType,
  runId?: string,
): string {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
  }

  if (loggerType) {
    entry.loggerType = loggerType
  }

  if (runId) {
    entry.runId = runId
  }

  if (context && Object.keys(context).length > 0) {
    entry.context = sanitizeContext(context)
  }

  return JSON.stringify(entry)
}

/**
 * Logger class with structured logging support
 */
export class Logger {
  private readonly loggerType?: LoggerType
  private readonly baseContext: LogContext

  constructor(loggerType?: LoggerType, baseContext: LogContext = {}) {
    this.loggerType = loggerType
    this.baseContext = baseContext
  }

  debug(message: string, context?: LogContext, error?: unknown): void {
    this.write('debug', message, context, error)
  }

  info(message: string, context?: LogContext, error?: unknown): void {
    this.write('info', message, context, error)
  }

  warn(message: string, context?: LogContext, error?: unknown): void {
    this.write('warn', message, context, error)
  }

  error(message: string, context?: LogContext, error?: unknown): void {
    this.write('error', message, context, error)
  }

  /**
   * Create a child logger with a base operation context
   */
  child(baseContext: LogContext): Logger {
    return new Logger(this.loggerType, { ...this.baseContext, ...baseContext })
  }

  private write(
    level: LogLevel,
    message: string,
    context: LogContext | undefined,
    error: unknown,
  ): void {
    if (!shouldLog(level, this.loggerType)) return

    const withBase = { ...this.baseContext, ...context }
    const merged =
      error !== undefined ? mergeErrorIntoContext(withBase, error) : withBase

    console.error(
      formatLogEntry(level, message, merged, this.loggerType, getRunId()),
    )
  }
}

export function createLogger(loggerType: LoggerType): Logger {
  return new Logger(loggerType)
}

/**
 * Helper to measure execution time
 */
export async function measureTime<T>(
  fn: () => Promise<T>,
): Promise<{ result: T; duration: number }> {
  const start = Date.now()
  const result = await fn()
  return { result, duration: Date.now() - start }
}
