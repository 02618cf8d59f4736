/**
 * Process and filesystem defaults
 *
 * @module config/limits
 */

import { readFile, stat } from 'node:fs/promises'
import { FALLBACK_DIR_MODE } from '../constants'

const PROC_LIMITS = '/proc/self/limits'

/**
 * Extract the soft open-files limit from `/proc/<pid>/limits` text.
 * Returns undefined for `unlimited` or when the line is absent.
 *
 * @example
 * ```typescript
 * parseFileLimit('Max open files            1024                 524288               files')
 * // 1024
 * ```
 */
export function parseFileLimit(text: string): number | undefined {
  for (const line of text.split('\n')) {
    const match = /^Max open files\s+(\S+)\s+(\S+)/.exec(line)
    if (!match) continue
    const soft = match[1]
    if (soft === undefined || !/^\d+$/.test(soft)) return undefined
    return Number(soft)
  }
  return undefined
}

/**
 * Soft limit on open file descriptors, or undefined when it cannot be read
 * (non-Linux systems, restricted /proc)
 */
export async function getFileLimit(limitsPath = PROC_LIMITS): Promise<number | undefined> {
  try {
    return parseFileLimit(await readFile(limitsPath, 'utf8'))
  } catch {
    return undefined
  }
}

/**
 * Permission bits of `dir` as three octal digits, e.g. `755`
 */
export async function defaultDirMode(dir: string): Promise<string> {
  try {
    const stats = await stat(dir)
    return (stats.mode & 0o777).toString(8).padStart(3, '0')
  } catch {
    return FALLBACK_DIR_MODE
  }
}
