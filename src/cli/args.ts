/**
 * CLI Argument Parser
 *
 * Pure functions for parsing command line arguments. Values are kept as
 * typed; resolveConfig validates them.
 */

import { ConfigurationError } from '../errors'
import type { ConfigInput } from '../config/options'

// =============================================================================
// Types
// =============================================================================

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  /** Repodata snapshot paths */
  args: string[]
  options: ConfigInput & {
    help: boolean
    version: boolean
    prune: boolean
  }
}

// =============================================================================
// Parser
// =============================================================================

function takeValue(argv: string[], i: number, flag: string): string {
  const value = argv[i]
  if (value === undefined) {
    throw new ConfigurationError(`Missing value for ${flag}`, { configKey: flag })
  }
  return value
}

/**
 * Parse command line arguments
 *
 * @example
 * ```typescript
 * parseArgs(['-c', 'cache.json', '-b', 'x86_64-repodata'])
 * // { args: ['x86_64-repodata'], options: { cache: 'cache.json', prune: true, ... } }
 * ```
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = {
    args: [],
    options: {
      help: false,
      version: false,
      prune: false,
    },
  }

  let i = 0
  while (i < argv.length) {
    const arg = argv[i]

    if (arg === undefined || arg === '') {
      i++
      continue
    }

    // Everything after -- is a path
    if (arg === '--') {
      result.args.push(...argv.slice(i + 1))
      break
    }

    if (arg.startsWith('-') && arg !== '-') {
      switch (arg) {
        case '-h':
        case '--help':
          result.options.help = true
          break
        case '--version':
          result.options.version = true
          break
        case '-c':
        case '--cache':
          result.options.cache = takeValue(argv, ++i, arg)
          break
        case '-m':
        case '--mode':
          result.options.mode = takeValue(argv, ++i, arg)
          break
        case '-L':
        case '--limit':
          result.options.limit = takeValue(argv, ++i, arg)
          break
        case '-b':
        case '--prune':
          result.options.prune = true
          break
        case '-d':
        case '--directory':
          result.options.directory = takeValue(argv, ++i, arg)
          break
        case '-v':
        case '--log-level':
          result.options.logLevel = takeValue(argv, ++i, arg)
          break
        default:
          throw new ConfigurationError(`Unknown option: ${arg}`, { configKey: arg })
      }
    } else {
      result.args.push(arg)
    }
    i++
  }

  return result
}
