/**
 * xbps-mandump
 *
 * Extracts manual pages from XBPS package archives, with a persistent cache
 * that skips unchanged packages and removes pages of packages that are gone.
 *
 * @packageDocumentation
 */

// =============================================================================
// Repodata
// =============================================================================

export { RepoData, computeAggregateETag } from './repodata/repodata'
export type { PackageRecord, PackageJSON } from './repodata/package'
export { packageToJSON, parseBuildDate, formatRFC3339, computePackageETag } from './repodata/package'
export type { PkgVer } from './repodata/pkgver'
export { parsePkgVer, formatPkgVer } from './repodata/pkgver'
export type { FilterFunc } from './repodata/filter'
export { filterPackages } from './repodata/filter'
export { SparseIndexSet } from './repodata/sparse-set'

// =============================================================================
// Archives
// =============================================================================

export type { CompressionFormat, Decoder } from './archive/compression'
export { detectCompression, decoderFor, decodeXz, decodeZstd } from './archive/compression'
export type { TarEntry, TarEntryType } from './archive/tar-reader'
export { TarReader, readEntry, normalizeEntryName } from './archive/tar-reader'
export type { ManifestEntry, PackageManifest } from './archive/manifest'
export { parseManifest, hasManDirs, manPageTargets } from './archive/manifest'

// =============================================================================
// Extraction & Cache
// =============================================================================

export type { DumperOptions } from './dump/dumper'
export { Dumper, packageArchivePath, isSkippedPackage } from './dump/dumper'
export type { RunDumpOptions, RunDumpResult } from './dump/run'
export { runDump } from './dump/run'
export type { ExtractionResult, ExtractionStatus, CacheLedgerOptions } from './cache/ledger'
export { CacheLedger } from './cache/ledger'
export type { CacheMap, CacheRecords } from './cache/records'
export { loadCache, parseCacheRecords, serializeCacheRecords, writeCache, emptyCacheRecords } from './cache/records'
export type { RemoveStaleFilesOptions, RemoveStaleFilesResult } from './cache/cleanup'
export { removeStaleFiles } from './cache/cleanup'

// =============================================================================
// Concurrency
// =============================================================================

export { WeightedSemaphore } from './concurrency/semaphore'
export type { Task } from './concurrency/task-group'
export { TaskGroup, throwIfCancelled } from './concurrency/task-group'

// =============================================================================
// Configuration
// =============================================================================

export type { ConfigInput, ConfigContext, DumpConfig } from './config/options'
export { resolveConfig, parseMode, parseLimit } from './config/options'
export { getFileLimit, parseFileLimit, defaultDirMode } from './config/limits'

// =============================================================================
// Errors & Logging
// =============================================================================

export * from './errors'
export type { Logger, LogLevel, LogFields, LoggerOptions } from './utils/logger'
export { createLogger, noopLogger, elapsed, isLogLevel, LOG_LEVELS } from './utils/logger'
