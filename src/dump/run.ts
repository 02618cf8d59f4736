/**
 * One complete dump run: load the cache, extract every snapshot, remove
 * files no package claims, then persist the new cache.
 *
 * @module dump/run
 */

import { type RemoveStaleFilesResult, removeStaleFiles } from '../cache/cleanup'
import { CacheLedger } from '../cache/ledger'
import { type CacheRecords, loadCache, writeCache } from '../cache/records'
import { WeightedSemaphore } from '../concurrency/semaphore'
import type { DumpConfig } from '../config/options'
import { type Logger, elapsed, logFile, noopLogger } from '../utils/logger'
import { Dumper } from './dumper'

export interface RunDumpOptions {
  logger?: Logger | undefined
  /** Receives the cache when no cache file is configured (default: process.stdout) */
  stdout?: ((text: string) => void) | undefined
  signal?: AbortSignal | undefined
}

export interface RunDumpResult {
  /** The cache as written */
  records: CacheRecords
  /** Outcome of stale file removal */
  cleanup: RemoveStaleFilesResult
}

/**
 * Run a full dump with the given configuration.
 *
 * @throws {ConfigurationError} when the cache file is invalid
 * @throws the first error raised while extracting; nothing is removed or
 * written in that case
 */
export async function runDump(config: DumpConfig, options: RunDumpOptions = {}): Promise<RunDumpResult> {
  const logger = options.logger ?? noopLogger
  const timer = elapsed()

  const prior = await loadCache(config.cacheFile, logger)
  const ledger = new CacheLedger(prior.cache, { prune: config.prune })
  const dumper = new Dumper({
    outputDir: config.outputDir,
    dirMode: config.dirMode,
    semaphore: new WeightedSemaphore(config.openLimit),
    ledger,
    logger,
  })

  try {
    await dumper.dumpAll(config.repodata, options.signal)
  } catch (error) {
    logger.error('Fatal error processing files', error)
    throw error
  }

  ledger.carryForward()
  const cleanup = await removeStaleFiles(ledger.staleFiles(), { outputDir: config.outputDir, logger })

  const records = ledger.toRecords()
  try {
    await writeCache(records, config.cacheFile, options.stdout)
  } catch (error) {
    logger.error('Error writing cache', error, config.cacheFile !== undefined ? logFile(config.cacheFile) : {})
    throw error
  }

  logger.info('Done', { ...timer(), ...cleanup })
  return { records, cleanup }
}
