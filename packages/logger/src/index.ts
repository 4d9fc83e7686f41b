/**
 * @shelfwatch/logger
 *
 * Structured logging shared by every Shelfwatch package.
 *
 * - JSON lines in production, coloured single-line output in development
 * - ISO 8601 timestamps
 * - Levels: debug, info, warn, error, fatal
 * - Child loggers with a component path and inherited context
 * - Secret-bearing keys are redacted before output
 *
 * Environment variables:
 * - LOG_LEVEL: minimum level (debug, info, warn, error, fatal). Default: info
 * - LOG_FORMAT: json | pretty. Default: json in production, pretty elsewhere
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface LogContext {
  [key: string]: unknown
}

interface LogEntry {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: {
    name: string
    message: string
    code?: string
    stack?: string
  }
  [key: string]: unknown
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

/** Keys whose values never reach the output, matched case-insensitively. */
const REDACTED_KEYS = new Set([
  'apikey',
  'api_key',
  'authorization',
  'password',
  'secret',
  'token',
  'accesstoken',
  'x-api-key',
])

export const REDACTED = '[REDACTED]'

let levelOverride: LogLevel | null = null

/**
 * Override the minimum level for every logger in the process.
 * Pass null to fall back to LOG_LEVEL.
 */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS
}

function getLogLevel(): LogLevel {
  if (levelOverride) return levelOverride
  const level = process.env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(level) ? level : 'info'
}

function getLogFormat(): 'json' | 'pretty' {
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()]
}

function redact(value: unknown, depth = 0): unknown {
  if (depth > 4 || value === null || typeof value !== 'object') {
    return value
  }
  if (Array.isArray(value)) {
    return value.map((item) => redact(item, depth + 1))
  }
  if (value instanceof Date) {
    return value
  }
  const out: Record<string, unknown> = {}
  for (const [key, inner] of Object.entries(value)) {
    out[key] = REDACTED_KEYS.has(key.toLowerCase()) ? REDACTED : redact(inner, depth + 1)
  }
  return out
}

function formatError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined
    return {
      name: error.name,
      message: error.message,
      ...(code ? { code } : {}),
      stack: error.stack,
    }
  }

  return {
    name: 'UnknownError',
    message: String(error),
  }
}

function formatPretty(entry: LogEntry): string {
  const color = LOG_COLORS[entry.level]
  const levelStr = entry.level.toUpperCase().padEnd(5)
  const componentPath = entry.component ? `${entry.service}:${entry.component}` : entry.service

  const { timestamp, level: _level, service: _service, component: _component, message, error, ...meta } = entry

  const metaStr = Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''
  const errorStr = error ? `\n  ${DIM}${error.stack || error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

function output(entry: LogEntry): void {
  const formatted = getLogFormat() === 'json' ? JSON.stringify(entry) : formatPretty(entry)

  switch (entry.level) {
    case 'debug':
      console.debug(formatted)
      break
    case 'info':
      console.info(formatted)
      break
    case 'warn':
      console.warn(formatted)
      break
    case 'error':
    case 'fatal':
      console.error(formatted)
      break
  }
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger.
   * A string extends the component path; an object only adds context.
   */
  child(componentOrContext: string | LogContext, defaultContext?: LogContext): ILogger
}

export class Logger implements ILogger {
  constructor(
    private readonly service: string,
    private readonly component?: string,
    private readonly defaultContext: LogContext = {}
  ) {}

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (!shouldLog(level)) return

    const context = redact({ ...this.defaultContext, ...meta })
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...(typeof context === 'object' && context !== null ? context : {}),
    }

    if (this.component) {
      entry.component = this.component
    }

    if (error !== undefined) {
      entry.error = formatError(error)
    }

    output(entry)
  }

  debug(message: string, meta?: LogContext): void {
    this.log('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.log('info', message, meta)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.log('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.log('error', message, meta, error)
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.log('fatal', message, meta, error)
  }

  child(componentOrContext: string | LogContext, defaultContext: LogContext = {}): ILogger {
    if (typeof componentOrContext === 'object') {
      return new Logger(this.service, this.component, {
        ...this.defaultContext,
        ...componentOrContext,
      })
    }
    const component = this.component ? `${this.component}:${componentOrContext}` : componentOrContext
    return new Logger(this.service, component, {
      ...this.defaultContext,
      ...defaultContext,
    })
  }
}

/**
 * Create a logger for a service.
 *
 * @example
 * ```ts
 * const logger = createLogger('collector')
 * logger.info('RUN_STARTED', { competitors: 3 })
 *
 * const classifierLog = logger.child('classifier')
 * classifierLog.debug('PAGE_CLASSIFIED', { label: 'product' })
 * ```
 */
export function createLogger(service: string): ILogger {
  return new Logger(service)
}
