/**
 * Run configuration
 *
 * Validates raw option values (as typed on the command line) into the
 * settings a dump run uses.
 *
 * @module config/options
 */

import { resolve } from 'node:path'
import { DEFAULT_OPEN_LIMIT, MIN_OPEN_LIMIT } from '../constants'
import { ConfigurationError } from '../errors'
import { LOG_LEVELS, type LogLevel, isLogLevel } from '../utils/logger'

// =============================================================================
// Types
// =============================================================================

/**
 * Raw option values; every field is optional and unvalidated
 */
export interface ConfigInput {
  cache?: string | undefined
  mode?: string | undefined
  limit?: string | undefined
  prune?: boolean | undefined
  directory?: string | undefined
  logLevel?: string | undefined
}

/**
 * Environment facts the defaults depend on
 */
export interface ConfigContext {
  /** Soft open-files limit; undefined when unknown */
  fileLimit?: number | undefined
  /** Mode used when none is given, three octal digits */
  defaultMode: string
  /** Base for a relative output directory (default: process.cwd()) */
  cwd?: string | undefined
}

/**
 * Validated settings for one run
 */
export interface DumpConfig {
  /** Repodata snapshots to process */
  repodata: string[]
  /** Cache file; undefined writes the cache to stdout */
  cacheFile?: string | undefined
  /** Permission bits for created directories */
  dirMode: number
  /** Budget of simultaneously open files */
  openLimit: number
  /** Drop files of packages not seen this run */
  prune: boolean
  /** Absolute output root */
  outputDir: string
  logLevel: LogLevel
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse an octal permission string such as `755` or `0750`.
 *
 * @throws {ConfigurationError} when the value is not octal, zero, or above 7777
 */
export function parseMode(value: string): number {
  if (!/^[0-7]+$/.test(value)) {
    throw new ConfigurationError(`Invalid file mode: cannot be parsed: ${value}`, {
      configKey: 'mode',
      actualValue: value,
    })
  }
  const mode = parseInt(value, 8)
  if (mode === 0) {
    throw new ConfigurationError('Invalid file mode: may not be 0', { configKey: 'mode', actualValue: value })
  }
  if (mode > 0o7777) {
    throw new ConfigurationError(`Invalid file mode: must be at most 7777: ${value}`, {
      configKey: 'mode',
      actualValue: value,
    })
  }
  return mode
}

/**
 * Validate the open-file budget against the process limit.
 *
 * @throws {ConfigurationError} when the limit is not an integer in [2, fileLimit]
 */
export function parseLimit(value: string | undefined, fileLimit?: number): number {
  let limit: number
  if (value === undefined) {
    limit = fileLimit !== undefined ? Math.min(DEFAULT_OPEN_LIMIT, fileLimit) : DEFAULT_OPEN_LIMIT
  } else if (/^\d+$/.test(value)) {
    limit = Number(value)
  } else {
    throw new ConfigurationError(`Invalid limit: not an integer: ${value}`, { configKey: 'limit', actualValue: value })
  }

  if (limit < MIN_OPEN_LIMIT) {
    throw new ConfigurationError(`Invalid limit: must be >= ${MIN_OPEN_LIMIT}`, {
      configKey: 'limit',
      expectedValue: `>= ${MIN_OPEN_LIMIT}`,
      actualValue: limit,
    })
  }
  if (fileLimit !== undefined && limit > fileLimit) {
    throw new ConfigurationError(`Invalid limit: must be <= nofiles (${fileLimit})`, {
      configKey: 'limit',
      expectedValue: `<= ${fileLimit}`,
      actualValue: limit,
    })
  }
  return limit
}

/**
 * Build the run configuration from raw options.
 *
 * @example
 * ```typescript
 * const config = resolveConfig(['x86_64-repodata'], { limit: '8', prune: true }, {
 *   fileLimit: await getFileLimit(),
 *   defaultMode: await defaultDirMode('.'),
 * })
 * ```
 */
export function resolveConfig(repodata: string[], input: ConfigInput, context: ConfigContext): DumpConfig {
  const logLevel = input.logLevel ?? 'warn'
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`Invalid log level: ${logLevel} (expected one of ${LOG_LEVELS.join(', ')})`, {
      configKey: 'logLevel',
      expectedValue: LOG_LEVELS,
      actualValue: logLevel,
    })
  }

  return {
    repodata: [...repodata],
    cacheFile: input.cache || undefined,
    dirMode: parseMode(input.mode ?? context.defaultMode),
    openLimit: parseLimit(input.limit, context.fileLimit),
    prune: input.prune ?? false,
    outputDir: resolve(context.cwd ?? process.cwd(), input.directory ?? '.'),
    logLevel,
  }
}
