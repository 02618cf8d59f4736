/**
 * Mandump Constants
 *
 * Centralized constants used throughout the codebase.
 */

// =============================================================================
// Repository Layout
// =============================================================================

/**
 * Name of the index property list inside a repodata archive
 */
export const REPO_INDEX_FILE = 'index.plist'

/**
 * Repository label assigned when the caller supplies none
 */
export const DEFAULT_REPOSITORY = 'current'

/**
 * Suffix of package archive file names: `<pkgver>.<arch>.xbps`
 */
export const PACKAGE_FILE_SUFFIX = '.xbps'

/**
 * Name of the files manifest inside a package archive
 */
export const PACKAGE_MANIFEST_FILE = 'files.plist'

/**
 * Package name suffixes that are never scanned (debug symbols, multilib)
 */
export const SKIPPED_PACKAGE_SUFFIXES: readonly string[] = ['-dbg', '-32bit']

// =============================================================================
// Manual Pages
// =============================================================================

/**
 * Absolute directory prefix that marks a package as shipping manual pages
 */
export const MAN_DIRS_PREFIX = '/usr/share/man/man'

/**
 * Archive entry prefix (no leading slash) of manual page files
 */
export const MAN_PATH_PREFIX = 'usr/share/man/man'

/**
 * Prefix stripped from archive entries to form output paths (`man1/ls.1`)
 */
export const MAN_PATH_TRIM_PREFIX = 'usr/share/man/'

// =============================================================================
// Filtering
// =============================================================================

/**
 * Catalog size from which filtering is split into concurrent chunks
 */
export const MIN_SPLIT_FILTER = 3000

/**
 * Records per concurrent filter chunk
 */
export const FILTER_SPLIT_SIZE = 2000

// =============================================================================
// Concurrency
// =============================================================================

/**
 * Default budget of simultaneously open files
 */
export const DEFAULT_OPEN_LIMIT = 20

/**
 * Smallest usable budget: one package plus one output file
 */
export const MIN_OPEN_LIMIT = 2

/**
 * Semaphore weight taken by each package worker
 */
export const PACKAGE_WORKER_WEIGHT = 2

// =============================================================================
// Cache
// =============================================================================

/**
 * Current cache file format version
 */
export const CACHE_VERSION = 1

/**
 * JSON key holding the hash-to-files map in a version 1 cache file
 */
export const CACHE_KEY = 'cache-v1'

/**
 * Permission bits of a written cache file
 */
export const CACHE_FILE_MODE = 0o600

/**
 * Directory mode used when the output directory cannot be inspected
 */
export const FALLBACK_DIR_MODE = '755'
