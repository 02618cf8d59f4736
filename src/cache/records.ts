/**
 * Cache file persistence
 *
 * The cache maps a package archive's SHA-256 to the output paths extracted
 * from it:
 *
 * ```json
 * {"version":1,"cache-v1":{"<sha256>":["man1/ls.1","man1/dir.1"]}}
 * ```
 *
 * @module cache/records
 */

import { readFile, writeFile } from 'node:fs/promises'
import { CACHE_FILE_MODE, CACHE_KEY, CACHE_VERSION } from '../constants'
import { ConfigurationError, isErrnoException, storageError } from '../errors'
import { isInteger, isRecord, isStringArrayRecord, safeJsonParse } from '../utils/json-validation'
import { type Logger, logFile } from '../utils/logger'

/**
 * Content hash to output paths
 */
export type CacheMap = Record<string, string[]>

export interface CacheRecords {
  /** Format version; 0 when the file predates versioning */
  version: number
  cache: CacheMap
}

/**
 * An empty cache, as used when no cache file exists yet
 */
export function emptyCacheRecords(): CacheRecords {
  return { version: CACHE_VERSION, cache: {} }
}

/**
 * Decode cache file contents.
 *
 * Versions 0 and 1 share a layout. Newer versions are read as-is.
 *
 * @throws {ConfigurationError} when the text is not JSON or has the wrong shape
 */
export function parseCacheRecords(text: string, path = '<cache>'): CacheRecords {
  const parsed = safeJsonParse(text)
  if (!parsed.ok) {
    throw new ConfigurationError(`Invalid cache file ${path}: ${parsed.error.message}`, { configKey: 'cache' }, parsed.error)
  }
  const root = parsed.value
  if (!isRecord(root)) {
    throw new ConfigurationError(`Invalid cache file ${path}: expected a JSON object`, { configKey: 'cache' })
  }

  const version = root.version ?? 0
  if (!isInteger(version) || version < 0) {
    throw new ConfigurationError(`Invalid cache file ${path}: version must be a non-negative integer`, {
      configKey: 'cache',
      actualValue: version,
    })
  }

  const cache = root[CACHE_KEY] ?? {}
  if (!isStringArrayRecord(cache)) {
    throw new ConfigurationError(`Invalid cache file ${path}: ${CACHE_KEY} must map hashes to path lists`, {
      configKey: 'cache',
    })
  }

  return { version, cache: { ...cache } }
}

/**
 * Load the cache file. A missing file yields an empty cache.
 *
 * @throws {ConfigurationError} when the file cannot be read or decoded
 */
export async function loadCache(path: string | undefined, logger: Logger): Promise<CacheRecords> {
  if (path === undefined) {
    return emptyCacheRecords()
  }
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    if (isErrnoException(error, 'ENOENT')) {
      logger.warn('Cache file not found', logFile(path))
      return emptyCacheRecords()
    }
    const cause = storageError('read', path, error)
    throw new ConfigurationError(`Invalid cache file ${path}: ${cause.message}`, { configKey: 'cache' }, cause)
  }

  const records = parseCacheRecords(text, path)
  if (records.version > CACHE_VERSION) {
    logger.warn('Cache file has a newer version', { ...logFile(path), version: records.version })
  }
  return records
}

/**
 * Encode cache records. Hashes are written in sorted order.
 */
export function serializeCacheRecords(records: CacheRecords): string {
  const cache = Object.fromEntries(
    Object.keys(records.cache).sort().map((hash): [string, string[]] => [hash, records.cache[hash] ?? []])
  )
  return JSON.stringify({ version: records.version, [CACHE_KEY]: cache })
}

/**
 * Write the cache to `path` with mode 0600, or to `stdout` when no path
 * is configured.
 *
 * @throws {StorageError} when the file cannot be written
 */
export async function writeCache(
  records: CacheRecords,
  path: string | undefined,
  stdout: (text: string) => void = (text) => { process.stdout.write(text) }
): Promise<void> {
  const text = serializeCacheRecords(records)
  if (path === undefined) {
    stdout(text)
    return
  }
  try {
    await writeFile(path, text, { mode: CACHE_FILE_MODE })
  } catch (error) {
    throw storageError('write', path, error)
  }
}
