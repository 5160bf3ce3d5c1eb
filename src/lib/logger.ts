/**
 * Structured Logger
 *
 * Zero-dependency logger for the sync pipeline.
 * - Pretty mode: colorized single-line output with timestamps (default outside production)
 * - JSON mode: one object per line for log aggregation
 * - LOG_LEVEL overrides the minimum level, LOG_FORMAT the output mode
 *
 * Child loggers extend the name (`drive-sync:audit`) and carry bound context
 * such as the run's root folder into every entry.
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
export type LogFormat = 'pretty' | 'json'
export type LogContext = Record<string, string | number | boolean>

export interface LogEntry {
  level: LogLevel
  message: string
  name: string
  timestamp: string
  context?: LogContext
  data?: unknown
}

/** Receives each formatted line; defaults to the console method for the level */
export type LogSink = (level: LogLevel, line: string) => void

export interface LoggerOptions {
  level?: LogLevel
  format?: LogFormat
  sink?: LogSink
  context?: LogContext
}

// =============================================================================
// Level Config
// =============================================================================

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',   // gray
  info: '\x1b[36m',    // cyan
  warn: '\x1b[33m',    // yellow
  error: '\x1b[31m',   // red
}

const RESET = '\x1b[0m'
const BOLD = '\x1b[1m'
const DIM = '\x1b[2m'

// =============================================================================
// Environment Detection
// =============================================================================

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_PRIORITY, value)
}

function envDefaults(): Required<Pick<LoggerOptions, 'level' | 'format'>> {
  const isProduction = process.env.NODE_ENV === 'production'
  const envLevel = process.env.LOG_LEVEL?.trim().toLowerCase()
  const envFormat = process.env.LOG_FORMAT?.trim().toLowerCase()

  return {
    level: isLogLevel(envLevel) ? envLevel : isProduction ? 'info' : 'debug',
    format: envFormat === 'json' || envFormat === 'pretty' ? envFormat : isProduction ? 'json' : 'pretty',
  }
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') console.error(line)
  else if (level === 'warn') console.warn(line)
  else console.log(line)
}

// =============================================================================
// Formatting
// =============================================================================

function renderData(data: unknown): string {
  if (data instanceof Error) return data.stack ?? data.message
  if (typeof data === 'string') return data
  return JSON.stringify(data)
}

export function formatPretty(entry: LogEntry): string {
  const color = LEVEL_COLORS[entry.level]
  const time = entry.timestamp.slice(entry.timestamp.indexOf('T') + 1).replace('Z', '')
  const prefix = `${DIM}${time}${RESET} ${color}${entry.level.toUpperCase().padEnd(5)}${RESET} ${BOLD}[${entry.name}]${RESET}`

  const context = entry.context
    ? ' ' + Object.entries(entry.context).map(([key, value]) => `${DIM}${key}=${value}${RESET}`).join(' ')
    : ''
  const data = entry.data !== undefined ? ` ${renderData(entry.data)}` : ''

  return `${prefix} ${entry.message}${context}${data}`
}

export function formatJson(entry: LogEntry): string {
  const data = entry.data instanceof Error ? { error: entry.data.message } : entry.data
  return JSON.stringify({ ...entry, ...(data !== undefined ? { data } : {}) })
}

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private readonly name: string
  private readonly level: LogLevel
  private readonly format: LogFormat
  private readonly sink: LogSink
  private readonly context: LogContext | undefined

  constructor(name: string, options: LoggerOptions = {}) {
    const defaults = envDefaults()
    this.name = name
    this.level = options.level ?? defaults.level
    this.format = options.format ?? defaults.format
    this.sink = options.sink ?? consoleSink
    this.context = options.context
  }

  child(childName: string, context?: LogContext): Logger {
    return new Logger(`${this.name}:${childName}`, {
      level: this.level,
      format: this.format,
      sink: this.sink,
      context: context ? { ...this.context, ...context } : this.context,
    })
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data)
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data)
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data)
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data)
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.level]) return

    const entry: LogEntry = {
      level,
      message,
      name: this.name,
      timestamp: new Date().toISOString(),
      ...(this.context ? { context: this.context } : {}),
      ...(data !== undefined ? { data } : {}),
    }

    this.sink(level, this.format === 'json' ? formatJson(entry) : formatPretty(entry))
  }
}

// =============================================================================
// Factory & Exports
// =============================================================================

export function createLogger(name: string, options?: LoggerOptions): Logger {
  return new Logger(name, options)
}

export const logger = createLogger('drive-sync')
