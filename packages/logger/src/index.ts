/**
 * @carlist/logger
 *
 * Structured logging for the crawler and its tooling.
 *
 * - JSON lines in production, colored single-line output in development
 * - Levels: debug, info, warn, error, fatal
 * - Child loggers extend the component path (`crawler:fetch:proxy`)
 * - Credentials embedded in URLs (proxy addresses) are masked before output
 *
 * Environment variables:
 * - LOG_LEVEL: Minimum log level. Default: info
 * - LOG_FORMAT: json | pretty. Default: json in production, pretty otherwise
 * - NODE_ENV: Used to determine defaults
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface LogContext {
  [key: string]: unknown
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: {
    name: string
    message: string
    stack?: string
  }
  [key: string]: unknown
}

/** Receives every entry that passes the level filter. */
export type LogWriter = (entry: LogEntry, formatted: string) => void

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

const REDACTED = '[REDACTED]'
const SENSITIVE_KEY = /password|secret|token|authorization|cookie|api[-_]?key/i
const URL_CREDENTIALS = /(\b[a-z][a-z0-9+.-]*:\/\/)[^/\s:@]+(?::[^/\s@]*)?@/gi

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS
}

function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase()
  if (level && isLogLevel(level)) {
    return level
  }
  return 'info'
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

/**
 * Mask `user:pass@` in any URL found in the string.
 */
export function maskUrlCredentials(value: string): string {
  return value.replace(URL_CREDENTIALS, `$1${REDACTED}@`)
}

/**
 * Recursively redact sensitive keys and URL credentials in log metadata.
 */
export function redactMeta(value: unknown, depth = 0): unknown {
  if (typeof value === 'string') {
    return maskUrlCredentials(value)
  }
  if (depth > 5 || value === null || typeof value !== 'object') {
    return value
  }
  if (Array.isArray(value)) {
    return value.map(item => redactMeta(item, depth + 1))
  }
  if (value instanceof Date) {
    return value.toISOString()
  }

  return redactContext(Object.fromEntries(Object.entries(value)), depth + 1)
}

function redactContext(context: LogContext, depth = 0): LogContext {
  const next: LogContext = {}
  for (const [key, val] of Object.entries(context)) {
    next[key] = SENSITIVE_KEY.test(key) ? REDACTED : redactMeta(val, depth)
  }
  return next
}

function formatError(error: unknown): LogEntry['error'] | undefined {
  if (!error) return undefined

  if (error instanceof Error) {
    return {
      name: error.name,
      message: maskUrlCredentials(error.message),
      stack: error.stack ? maskUrlCredentials(error.stack) : undefined,
    }
  }

  return {
    name: 'UnknownError',
    message: maskUrlCredentials(String(error)),
  }
}

function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

function formatPretty(entry: LogEntry): string {
  const color = LOG_COLORS[entry.level]
  const levelStr = entry.level.toUpperCase().padEnd(5)

  const componentPath = entry.component
    ? `${entry.service}:${entry.component}`
    : entry.service

  const { timestamp, level: _level, service: _service, component: _component, message, error, ...meta } = entry

  const metaStr =
    Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''

  const errorStr = error ? `\n  ${DIM}${error.stack || error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

function consoleWriter(entry: LogEntry, formatted: string): void {
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

let writer: LogWriter = consoleWriter

/**
 * Replace the output writer (tests capture entries this way).
 * Returns a function restoring the previous writer.
 */
export function setLogWriter(next: LogWriter): () => void {
  const previous = writer
  writer = next
  return () => {
    writer = previous
  }
}

function output(entry: LogEntry): void {
  const format = getLogFormat()
  const formatted = format === 'json' ? formatJson(entry) : formatPretty(entry)
  writer(entry, formatted)
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger
   * @param componentOrContext - Component name, or a context object merged into every entry
   * @param defaultContext - Extra context (only used when the first argument is a component name)
   */
  child(componentOrContext: string | LogContext, defaultContext?: LogContext): ILogger
}

export class Logger implements ILogger {
  private readonly service: string
  private readonly component?: string
  private readonly defaultContext: LogContext

  constructor(service: string, component?: string, defaultContext: LogContext = {}) {
    this.service = service
    this.component = component
    this.defaultContext = defaultContext
  }

  private log(
    level: LogLevel,
    message: string,
    meta?: LogContext,
    error?: unknown
  ): void {
    if (!shouldLog(level)) return

    const errorData = error ? formatError(error) : undefined
    const context = redactContext({ ...this.defaultContext, ...meta })

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...context,
    }

    if (this.component) {
      entry.component = this.component
    }

    if (errorData) {
      entry.error = errorData
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
    const newComponent = this.component
      ? `${this.component}:${componentOrContext}`
      : componentOrContext
    return new Logger(this.service, newComponent, {
      ...this.defaultContext,
      ...defaultContext,
    })
  }
}

/**
 * Create a logger for a service
 *
 * @example
 * ```ts
 * import { createLogger } from '@carlist/logger'
 *
 * const logger = createLogger('crawler')
 * logger.child('proxy').warn('Proxy quarantined', { proxyId: 'proxy-2' })
 * ```
 */
export function createLogger(service: string): ILogger {
  return new Logger(service)
}
