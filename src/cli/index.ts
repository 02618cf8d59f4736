/**
 * xbps-mandump CLI
 *
 * Extracts manual pages from the package archives of XBPS repodata
 * snapshots into a `manN/` directory tree.
 *
 * Usage:
 *   xbps-mandump [options] <repodata>...
 */

import { defaultDirMode, getFileLimit } from '../config/limits'
import { resolveConfig } from '../config/options'
import { runDump } from '../dump/run'
import { type Logger, createLogger } from '../utils/logger'
import { parseArgs } from './args'

// =============================================================================
// Constants
// =============================================================================

export const VERSION = '0.1.0'

const HELP_TEXT = `
xbps-mandump v${VERSION}

Extract manual pages from XBPS package archives.

USAGE:
  xbps-mandump [options] <repodata>...

Package archives are read from the directory of each repodata file, e.g.
x86_64-repodata next to man-pages-6.05_1.x86_64.xbps.

OPTIONS:
  -c, --cache <file>          Cache file (default: write the cache to stdout)
  -m, --mode <octal>          Directory permissions (default: mode of the output directory)
  -L, --limit <n>             Concurrent open file limit (default: 20, capped at nofile)
  -b, --prune                 Remove files of packages not seen in this run
  -d, --directory <dir>       Output directory (default: current directory)
  -v, --log-level <level>     debug, info, warn or error (default: warn)
  -h, --help                  Show this help message
      --version               Show version number

EXAMPLES:
  # Extract pages and keep the cache between runs
  xbps-mandump -c .mandump.json /repo/current/x86_64-repodata

  # Rebuild a man tree, dropping pages of removed packages
  xbps-mandump -b -c .mandump.json -d /srv/man /repo/current/*-repodata
`

// =============================================================================
// Output Utilities
// =============================================================================

/**
 * Print to stdout
 */
export function print(message: string): void {
  process.stdout.write(message + '\n')
}

/**
 * Print to stderr
 */
export function printError(message: string): void {
  process.stderr.write('Error: ' + message + '\n')
}

// =============================================================================
// Main Entry Point
// =============================================================================

export interface MainOptions {
  /** Logger override; by default one is built from --log-level */
  logger?: Logger | undefined
  /** Receives the cache when no cache file is given */
  stdout?: ((text: string) => void) | undefined
}

/**
 * Main CLI entry point. Returns the process exit code.
 */
export async function main(argv: string[] = process.argv.slice(2), options: MainOptions = {}): Promise<number> {
  try {
    const parsed = parseArgs(argv)

    if (parsed.options.help) {
      print(HELP_TEXT)
      return 0
    }

    if (parsed.options.version) {
      print(`xbps-mandump v${VERSION}`)
      return 0
    }

    if (parsed.args.length === 0) {
      printError('No repodata files given')
      print('\nRun "xbps-mandump --help" for usage.')
      return 1
    }

    const outputDir = parsed.options.directory ?? '.'
    const config = resolveConfig(parsed.args, parsed.options, {
      fileLimit: await getFileLimit(),
      defaultMode: await defaultDirMode(outputDir),
    })
    const logger = options.logger ?? createLogger({ level: config.logLevel })

    await runDump(config, { logger, stdout: options.stdout })
    return 0
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    printError(message)
    return 1
  }
}
