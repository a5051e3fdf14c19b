/**
 * Structured Logging
 *
 * Leveled entries with timestamps and context, fanned out to sinks. The
 * default sink writes one line per entry to the console, as text or JSON;
 * hosts add their own sinks and tests read entries back from a MemorySink.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
export type LogFormat = 'text' | 'json'

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  context?: Record<string, unknown>
  error?: {
    name: string
    message: string
    code?: string
    stack?: string
  }
}

export type LogSink = (entry: LogEntry) => void

export interface LoggerConfig {
  minLevel: LogLevel
  sinks: LogSink[]
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVELS
}

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined
}

export function formatEntry(entry: LogEntry, format: LogFormat): string {
  if (format === 'json') return JSON.stringify(entry)

  const context = entry.context && Object.keys(entry.context).length > 0
    ? ' ' + JSON.stringify(entry.context)
    : ''
  return `[${entry.timestamp.slice(11, 19)}] ${entry.level.toUpperCase()}: ${entry.message}${context}`
}

/**
 * Console sink. Errors and warnings print their stack on the next line.
 */
export function consoleSink(format: LogFormat = 'text'): LogSink {
  return entry => {
    const line = formatEntry(entry, format)
    const detail = format === 'text' && entry.error ? entry.error.stack ?? entry.error.message : null
    switch (entry.level) {
      case 'debug':
        console.debug(line)
        break
      case 'info':
        console.info(line)
        break
      case 'warn':
        console.warn(line)
        if (detail) console.warn(detail)
        break
      case 'error':
        console.error(line)
        if (detail) console.error(detail)
        break
    }
  }
}

/**
 * Keeps the newest entries in memory
 */
export class MemorySink {
  private entries: LogEntry[] = []

  constructor(private readonly capacity = 1000) {}

  readonly write: LogSink = entry => {
    this.entries.push(entry)
    if (this.entries.length > this.capacity) {
      this.entries = this.entries.slice(-this.capacity)
    }
  }

  getEntries(level?: LogLevel): LogEntry[] {
    if (!level) return [...this.entries]
    return this.entries.filter(entry => entry.level === level)
  }

  clear(): void {
    this.entries = []
  }
}

interface LogTarget {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>, error?: Error): void
  error(message: string, error?: unknown, context?: Record<string, unknown>): void
  child(context: Record<string, unknown>): ChildLogger
}

class Logger implements LogTarget {
  private config: LoggerConfig

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { minLevel: 'info', sinks: [consoleSink()], ...config }
  }

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config }
  }

  /**
   * Attach a sink; returns a function that detaches it
   */
  addSink(sink: LogSink): () => void {
    this.config = { ...this.config, sinks: [...this.config.sinks, sink] }
    return () => {
      this.config = { ...this.config, sinks: this.config.sinks.filter(s => s !== sink) }
    }
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.minLevel]) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context
    }
    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: errorCode(error),
        stack: error.stack
      }
    }

    for (const sink of this.config.sinks) {
      sink(entry)
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context)
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context)
  }

  warn(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.log('warn', message, context, error)
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    const errorObj = error instanceof Error ? error : undefined
    const errorContext = error !== undefined && !(error instanceof Error)
      ? { ...context, errorValue: String(error) }
      : context

    this.log('error', message, errorContext, errorObj)
  }

  child(context: Record<string, unknown>): ChildLogger {
    return new ChildLogger(this, context)
  }
}

/**
 * Adds fixed context (component, session id) to every entry
 */
class ChildLogger implements LogTarget {
  constructor(
    private readonly parent: LogTarget,
    private readonly baseContext: Record<string, unknown>
  ) {}

  private merge(context?: Record<string, unknown>): Record<string, unknown> {
    return { ...this.baseContext, ...context }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.parent.debug(message, this.merge(context))
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.parent.info(message, this.merge(context))
  }

  warn(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.parent.warn(message, this.merge(context), error)
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.parent.error(message, error, this.merge(context))
  }

  child(context: Record<string, unknown>): ChildLogger {
    return new ChildLogger(this, context)
  }
}

/**
 * LOG_LEVEL when valid, otherwise info in production and debug elsewhere
 */
export function levelFromEnv(env: Record<string, string | undefined> = process.env): LogLevel {
  const fromEnv = env.LOG_LEVEL
  if (isLogLevel(fromEnv)) return fromEnv
  return env.NODE_ENV === 'production' ? 'info' : 'debug'
}

export function formatFromEnv(env: Record<string, string | undefined> = process.env): LogFormat {
  return env.LOG_FORMAT === 'json' ? 'json' : 'text'
}

export const logger = new Logger({
  minLevel: levelFromEnv(),
  sinks: process.env.NODE_ENV === 'test' ? [] : [consoleSink(formatFromEnv())]
})

export { Logger, ChildLogger }

export const draftLogger = logger.child({ component: 'send-draft' })
export const psbtLogger = logger.child({ component: 'psbt' })
export const feeLogger = logger.child({ component: 'fee-bump' })
export const storageLogger = logger.child({ component: 'storage' })
