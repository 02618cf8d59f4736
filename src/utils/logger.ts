/**
 * Logger utility for mandump
 *
 * Provides a consistent logging interface. There is no global instance:
 * the CLI builds one logger and hands it to every component, which derive
 * children carrying their own structured fields (repodata, file, ...).
 *
 * @module utils/logger
 */

import { isMandumpError } from '../errors'

/**
 * Log levels, lowest first
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Valid level names, in ascending severity
 */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

/**
 * Structured fields attached to a log record
 */
export type LogFields = Record<string, unknown>

/**
 * Logger interface for consistent logging across the codebase
 */
export interface Logger {
  debug(message: string, fields?: LogFields): void
  info(message: string, fields?: LogFields): void
  warn(message: string, fields?: LogFields): void
  error(message: string, error?: unknown, fields?: LogFields): void
  /** Derive a logger that adds `fields` to every record */
  child(fields: LogFields): Logger
}

/**
 * Options for createLogger
 */
export interface LoggerOptions {
  /** Minimum level written (default: 'warn') */
  level?: LogLevel | undefined
  /** Line writer (default: process.stderr) */
  sink?: ((line: string) => void) | undefined
  /** Fields added to every record */
  fields?: LogFields | undefined
  /** Time source, for tests */
  clock?: (() => Date) | undefined
}

/**
 * Check whether a string names a log level
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value)
}

function describeError(error: unknown): unknown {
  if (isMandumpError(error)) return error.toJSON()
  if (error instanceof Error) return { name: error.name, message: error.message }
  return String(error)
}

/**
 * Create a logger writing tab-separated lines:
 * `<time>\t<LEVEL>\t<message>\t<fields as JSON>`
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' })
 * const log = logger.child({ repodata: 'x86_64-repodata' })
 * log.info('Processing repodata')
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'warn')
  const sink = options.sink ?? ((line: string) => { process.stderr.write(line + '\n') })
  const clock = options.clock ?? (() => new Date())

  const build = (base: LogFields): Logger => {
    const write = (level: LogLevel, message: string, fields?: LogFields): void => {
      if (LOG_LEVELS.indexOf(level) < threshold) return
      const merged = { ...base, ...fields }
      const parts = [clock().toISOString(), level.toUpperCase(), message]
      if (Object.keys(merged).length > 0) {
        parts.push(JSON.stringify(merged))
      }
      sink(parts.join('\t'))
    }

    return {
      debug: (message, fields) => write('debug', message, fields),
      info: (message, fields) => write('info', message, fields),
      warn: (message, fields) => write('warn', message, fields),
      error: (message, error, fields) => {
        write('error', message, error === undefined ? fields : { ...fields, error: describeError(error) })
      },
      child: (fields) => build({ ...base, ...fields }),
    }
  }

  return build(options.fields ?? {})
}

/**
 * Noop logger implementation
 * Silently discards all log messages
 */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
  child(): Logger {
    return noopLogger
  },
}

/**
 * Start a timer; calling the result yields a field with the elapsed time.
 *
 * @example
 * ```typescript
 * const timer = elapsed()
 * await work()
 * log.info('Finished', timer()) // { elapsed: '12ms' }
 * ```
 */
export function elapsed(key = 'elapsed'): () => LogFields {
  const start = performance.now()
  return () => ({ [key]: `${Math.round(performance.now() - start)}ms` })
}

// Field helpers for the records this tool writes

export const logRepoData = (file: string): LogFields => ({ repodata: file })
export const logFile = (file: string): LogFields => ({ file })
export const logPkgFile = (file: string): LogFields => ({ pkgfile: file })
export const logDumpFile = (file: string): LogFields => ({ dumpfile: file })
