import { Effect } from 'effect'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
export type LogFormat = 'json' | 'pretty'

export interface LogFields {
  readonly [key: string]: unknown
}

export interface LogEntry {
  readonly timestamp: string
  readonly level: LogLevel
  readonly message: string
  readonly fields?: LogFields
}

export type LogFormatter = (entry: LogEntry) => string

export interface LogSink {
  readonly write: (entry: LogEntry) => void
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export const isLogLevel = (value: string): value is LogLevel => value in LOG_LEVEL_PRIORITY

const formatPretty: LogFormatter = ({ timestamp, level, message, fields }) => {
  const payload = fields ? ` ${JSON.stringify(fields)}` : ''
  return `[${timestamp}] ${level.toUpperCase()} ${message}${payload}`
}

const formatJson: LogFormatter = ({ timestamp, level, message, fields }) =>
  JSON.stringify({ timestamp, level, message, fields })

export const logFormatters: Record<LogFormat, LogFormatter> = {
  json: formatJson,
  pretty: formatPretty,
}

const consoleMethodForLevel = (level: LogLevel): ((...args: unknown[]) => void) => {
  const method = console[level]
  if (typeof method === 'function') {
    return method.bind(console)
  }
  return console.log.bind(console)
}

const makeConsoleSink = (formatter: LogFormatter): LogSink => ({
  write(entry) {
    consoleMethodForLevel(entry.level)(formatter(entry))
  },
})

export interface LoggerConfig {
  readonly sink?: LogSink
  readonly level?: LogLevel
  readonly format?: LogFormat
  /** Fields attached to every entry written through this logger. */
  readonly fields?: LogFields
  readonly clock?: () => Date
}

export interface Logger {
  readonly log: (level: LogLevel, message: string, fields?: LogFields) => Effect.Effect<void, never, never>
  /** Returns a logger writing to the same sink with `fields` merged into every entry. */
  readonly child: (fields: LogFields) => Logger
}

const mergeFields = (bound: LogFields | undefined, fields: LogFields | undefined): LogFields | undefined => {
  if (!bound) {
    return fields
  }
  if (!fields) {
    return bound
  }
  return { ...bound, ...fields }
}

export const makeLogger = (config: LoggerConfig = {}): Logger => {
  const minimumLevel = config.level ?? 'info'
  const formatter = logFormatters[config.format ?? 'pretty']
  const sink = config.sink ?? makeConsoleSink(formatter)
  const clock = config.clock ?? (() => new Date())

  return {
    log(level, message, fields) {
      if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minimumLevel]) {
        return Effect.void
      }
      return Effect.sync(() => {
        sink.write({
          timestamp: clock().toISOString(),
          level,
          message,
          fields: mergeFields(config.fields, fields),
        })
      })
    },
    child(fields) {
      return makeLogger({ ...config, sink, fields: mergeFields(config.fields, fields) })
    },
  }
}

/** Writes a log entry from non-Effect code. Logging never fails, so this runs synchronously. */
export const writeLog = (logger: Logger, level: LogLevel, message: string, fields?: LogFields): void => {
  Effect.runSync(logger.log(level, message, fields))
}

export const makeSilentLogger = (): Logger => makeLogger({ sink: { write: () => {} } })
