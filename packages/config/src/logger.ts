/**
 * Structured logger.
 *
 * Emits one JSON line per entry: `{ ts, level, event, ...fields }`.
 * debug/info go to stdout, warn/error to stderr. Zero external
 * dependencies, same format as the server's request log.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export type LogFields = Record<string, unknown>

export interface LogEntry extends LogFields {
  ts: string
  level: Exclude<LogLevel, 'silent'>
  event: string
}

export type LogSink = (entry: LogEntry) => void

export interface Logger {
  readonly level: LogLevel
  debug(event: string, fields?: LogFields): void
  info(event: string, fields?: LogFields): void
  warn(event: string, fields?: LogFields): void
  error(event: string, fields?: LogFields): void
  /** Logger with `fields` merged into every entry. */
  child(fields: LogFields): Logger
}

export interface LoggerOptions {
  level?: LogLevel
  sink?: LogSink
  fields?: LogFields
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/** Writes each entry as a JSON line to the process streams. */
export const stdioSink: LogSink = (entry) => {
  const line = JSON.stringify(entry) + '\n'
  if (entry.level === 'warn' || entry.level === 'error') {
    process.stderr.write(line)
  } else {
    process.stdout.write(line)
  }
}

export function resolveLogLevel(): LogLevel {
  const raw = typeof process !== 'undefined' ? process.env['LOG_LEVEL'] : undefined
  if (raw && isLogLevel(raw)) return raw
  return 'info'
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? resolveLogLevel()
  const sink = options.sink ?? stdioSink
  const base = options.fields ?? {}
  const threshold = LEVEL_RANK[level]

  const emit = (entryLevel: LogEntry['level'], event: string, fields: LogFields = {}) => {
    if (LEVEL_RANK[entryLevel] < threshold) return
    sink({ ...base, ...fields, ts: new Date().toISOString(), level: entryLevel, event })
  }

  return {
    level,
    debug: (event, fields) => emit('debug', event, fields),
    info: (event, fields) => emit('info', event, fields),
    warn: (event, fields) => emit('warn', event, fields),
    error: (event, fields) => emit('error', event, fields),
    child: (fields) => createLogger({ level, sink, fields: { ...base, ...fields } }),
  }
}

/** Process-wide logger (level from LOG_LEVEL). */
export const logger: Logger = createLogger()
