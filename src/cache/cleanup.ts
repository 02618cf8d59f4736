/**
 * Stale file removal
 *
 * @module cache/cleanup
 */

import { unlink } from 'node:fs/promises'
import { resolve } from 'node:path'
import { isErrnoException } from '../errors'
import { isSafeRemovalPath } from '../utils/fs-path-safety'
import { type Logger, logFile, noopLogger } from '../utils/logger'

export interface RemoveStaleFilesOptions {
  /** Directory cached paths are relative to (default: cwd) */
  outputDir?: string | undefined
  logger?: Logger | undefined
}

export interface RemoveStaleFilesResult {
  /** Files deleted */
  removed: number
  /** Files that were already gone */
  missing: number
  /** Paths refused as absolute or escaping the output directory */
  skipped: number
  /** Deletions that failed */
  failed: number
}

/**
 * Delete files no package claims any more.
 *
 * Removal is best effort: failures are logged and counted, never thrown.
 */
export async function removeStaleFiles(
  paths: Iterable<string>,
  options: RemoveStaleFilesOptions = {}
): Promise<RemoveStaleFilesResult> {
  const outputDir = options.outputDir ?? process.cwd()
  const logger = options.logger ?? noopLogger
  const result: RemoveStaleFilesResult = { removed: 0, missing: 0, skipped: 0, failed: 0 }

  for (const path of paths) {
    if (!isSafeRemovalPath(outputDir, path)) {
      logger.debug('Skipping removal of unsafe file path', logFile(path))
      result.skipped++
      continue
    }

    logger.debug('Removing unused file', logFile(path))
    try {
      await unlink(resolve(outputDir, path))
      result.removed++
    } catch (error) {
      if (isErrnoException(error, 'ENOENT')) {
        result.missing++
      } else {
        logger.error('Error removing old file', error, logFile(path))
        result.failed++
      }
    }
  }

  return result
}
