/**
 * Manual page extraction
 *
 * A Dumper walks the packages of one or more repodata snapshots, opens each
 * package archive that is not already cached, and copies its manual pages
 * into the output directory as `manN/<page>`.
 *
 * @module dump/dumper
 */

import { type FileHandle, mkdir, open, symlink, unlink, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { detectCompression, decoderFor, SNIFF_LENGTH } from '../archive/compression'
import { hasManDirs, manPageTargets, parseManifest, type PackageManifest } from '../archive/manifest'
import { TarReader, readEntry, type TarEntry } from '../archive/tar-reader'
import type { CacheLedger, ExtractionResult } from '../cache/ledger'
import type { WeightedSemaphore } from '../concurrency/semaphore'
import { TaskGroup } from '../concurrency/task-group'
import {
  MAN_PATH_PREFIX,
  MAN_PATH_TRIM_PREFIX,
  PACKAGE_FILE_SUFFIX,
  PACKAGE_MANIFEST_FILE,
  PACKAGE_WORKER_WEIGHT,
  SKIPPED_PACKAGE_SUFFIXES,
} from '../constants'
import {
  ErrorCode,
  PathTraversalError,
  UnsupportedCompressionError,
  ValidationError,
  isErrnoException,
  isMandumpError,
  isNotFoundError,
  isSystemError,
  storageError,
} from '../errors'
import type { PackageRecord } from '../repodata/package'
import { RepoData } from '../repodata/repodata'
import { isSafeRemovalPath } from '../utils/fs-path-safety'
import {
  type Logger,
  elapsed,
  logDumpFile,
  logFile,
  logPkgFile,
  logRepoData,
  noopLogger,
} from '../utils/logger'

// =============================================================================
// Types
// =============================================================================

export interface DumperOptions {
  /** Directory pages are written under */
  outputDir: string
  /** Permission bits for created directories */
  dirMode: number
  /** Shared open-file budget; each package worker holds two units */
  semaphore: WeightedSemaphore
  /** Prior cache lookups and result recording */
  ledger: CacheLedger
  logger?: Logger | undefined
}

/**
 * Path of a package archive beside its repodata snapshot:
 * `<dir>/<pkgver>.<arch>.xbps`
 */
export function packageArchivePath(repodataPath: string, record: PackageRecord): string {
  return join(dirname(repodataPath), `${record.pkgver}.${record.architecture}${PACKAGE_FILE_SUFFIX}`)
}

/**
 * True for debug-symbol and multilib packages, which are never scanned
 */
export function isSkippedPackage(name: string): boolean {
  return SKIPPED_PACKAGE_SUFFIXES.some(suffix => name.endsWith(suffix))
}

/**
 * Classify a failure while decoding an archive: source I/O errors are
 * storage errors, everything else is malformed input.
 */
function readFailure(path: string, error: unknown): Error {
  if (isMandumpError(error)) return error
  if (isSystemError(error)) return storageError('read', path, error)
  const cause = error instanceof Error ? error : undefined
  const reason = error instanceof Error ? error.message : String(error)
  return new ValidationError(`Unable to read package ${path}: ${reason}`, ErrorCode.INVALID_FORMAT, { path }, cause)
}

// =============================================================================
// Dumper
// =============================================================================

export class Dumper {
  private readonly outputDir: string
  private readonly dirMode: number
  private readonly semaphore: WeightedSemaphore
  private readonly ledger: CacheLedger
  private readonly logger: Logger

  constructor(options: DumperOptions) {
    this.outputDir = options.outputDir
    this.dirMode = options.dirMode
    this.semaphore = options.semaphore
    this.ledger = options.ledger
    this.logger = options.logger ?? noopLogger
  }

  /**
   * Process every snapshot concurrently. The first failure cancels the rest.
   */
  async dumpAll(paths: readonly string[], signal?: AbortSignal): Promise<void> {
    const group = new TaskGroup(signal)
    for (const path of paths) {
      group.spawn(taskSignal => this.processRepoData(path, taskSignal))
    }
    await group.wait()
  }

  /**
   * Process all packages of one snapshot. A missing snapshot is logged and
   * skipped.
   */
  async processRepoData(path: string, signal?: AbortSignal): Promise<void> {
    const log = this.logger.child(logRepoData(path))
    const timer = elapsed()
    log.info('Processing repodata')

    const repo = new RepoData()
    try {
      await repo.loadRepo(path, undefined, signal)
    } catch (error) {
      if (isNotFoundError(error)) {
        log.warn('File does not exist')
        return
      }
      log.error('Unable to read repodata', error)
      throw error
    }

    const group = new TaskGroup(signal)
    for (const record of repo.index()) {
      const archivePath = packageArchivePath(path, record)
      try {
        await this.semaphore.acquire(PACKAGE_WORKER_WEIGHT, group.signal)
      } catch (error) {
        // Surface the failed worker's error, not the cancellation
        await group.wait()
        throw error
      }
      group.spawn(async taskSignal => {
        try {
          this.ledger.accept(await this.processPackage(record, archivePath, taskSignal))
        } finally {
          this.semaphore.release(PACKAGE_WORKER_WEIGHT)
        }
      })
    }

    await group.wait()
    log.info('Finished processing repodata', timer())
  }

  /**
   * Extract the manual pages of one package archive.
   *
   * @throws {UnsupportedCompressionError} when the archive is neither xz nor zstd
   * @throws {ValidationError} when the archive or its manifest is malformed
   * @throws {StorageError} when the archive cannot be read or a page cannot be written
   */
  async processPackage(record: PackageRecord, archivePath: string, signal?: AbortSignal): Promise<ExtractionResult> {
    const log = this.logger.child(logFile(archivePath))
    const hash = record.filenameSha256
    const cached = this.ledger.lookup(hash)

    if (isSkippedPackage(record.name)) {
      log.debug('Ignored debug/32-bit package')
      return { hash, paths: cached ? [...cached] : [], status: 'skipped' }
    }

    if (cached) {
      log.debug('Package already dumped')
      return { hash, paths: [...cached], status: 'cached' }
    }

    log.info('Processing file')
    const timer = elapsed()

    let handle: FileHandle
    try {
      handle = await open(archivePath, 'r')
    } catch (error) {
      if (isErrnoException(error, 'ENOENT')) {
        log.warn('File does not exist')
        return { hash, paths: [], status: 'missing' }
      }
      log.error('Cannot open file', error)
      throw storageError('open', archivePath, error)
    }

    try {
      const paths = await this.scanArchive(handle, archivePath, log, signal)
      log.info('Finished processing file', timer())
      return paths === undefined
        ? { hash, paths: [], status: 'irrelevant' }
        : { hash, paths, status: 'extracted' }
    } catch (error) {
      log.error('Error encountered reading package', error)
      throw error
    } finally {
      await handle.close()
    }
  }

  /**
   * Returns the written paths, or undefined when the package ships no
   * manual pages.
   */
  private async scanArchive(
    handle: FileHandle,
    archivePath: string,
    log: Logger,
    signal?: AbortSignal
  ): Promise<string[] | undefined> {
    let header: Buffer
    try {
      const { buffer, bytesRead } = await handle.read(Buffer.alloc(SNIFF_LENGTH), 0, SNIFF_LENGTH, 0)
      header = buffer.subarray(0, bytesRead)
    } catch (error) {
      throw storageError('read', archivePath, error)
    }

    const decoder = decoderFor(detectCompression(header))
    if (decoder === undefined) {
      throw new UnsupportedCompressionError(archivePath)
    }

    const source = handle.createReadStream({ start: 0, autoClose: false })
    const reader = new TarReader(decoder(source, signal), signal)
    try {
      const manifest = await this.readManifest(reader, archivePath)
      if (manifest === undefined || manifest.dirs.length === 0 || !hasManDirs(manifest)) {
        log.debug('No manual pages in package')
        return undefined
      }

      const targets = manPageTargets(manifest)
      const written: string[] = []
      while (targets.size > 0) {
        const entry = await this.nextEntry(reader, archivePath)
        if (entry === undefined) break
        if (!targets.delete(entry.name)) continue

        const path = await this.extractEntry(entry, archivePath, log)
        if (path !== undefined && !written.includes(path)) written.push(path)
      }
      return written
    } finally {
      await reader.close()
      source.destroy()
    }
  }

  private async nextEntry(reader: TarReader, archivePath: string): Promise<TarEntry | undefined> {
    try {
      return await reader.next()
    } catch (error) {
      throw readFailure(archivePath, error)
    }
  }

  private async readManifest(reader: TarReader, archivePath: string): Promise<PackageManifest | undefined> {
    for (let entry = await this.nextEntry(reader, archivePath); entry; entry = await this.nextEntry(reader, archivePath)) {
      if (entry.type !== 'file' || entry.name !== PACKAGE_MANIFEST_FILE) continue
      let bytes: Buffer
      try {
        bytes = await readEntry(entry)
      } catch (error) {
        throw readFailure(archivePath, error)
      }
      return parseManifest(bytes)
    }
    return undefined
  }

  /**
   * Write a page or recreate a page link. Returns the output path relative
   * to the output directory, or undefined for other entry types.
   */
  private async extractEntry(entry: TarEntry, archivePath: string, log: Logger): Promise<string | undefined> {
    if ((entry.type !== 'file' && entry.type !== 'symlink') || !entry.name.startsWith(MAN_PATH_PREFIX)) {
      return undefined
    }

    const relpath = entry.name.slice(MAN_PATH_TRIM_PREFIX.length)
    if (!isSafeRemovalPath(this.outputDir, relpath)) {
      throw new PathTraversalError(relpath)
    }
    const dest = join(this.outputDir, relpath)
    const entryLog = log.child({ ...logPkgFile(entry.rawName), ...logDumpFile(relpath) })

    try {
      await mkdir(dirname(dest), { recursive: true, mode: this.dirMode })
    } catch (error) {
      entryLog.error('Unable to create directory for manpage', error)
      throw storageError('mkdir', dirname(dest), error)
    }

    if (entry.type === 'file') {
      entryLog.debug('Found manpage')
      await this.removeExisting(dest, entryLog)
      try {
        await writeFile(dest, entry.body, { flag: 'wx' })
      } catch (error) {
        entryLog.error('Error copying pkgfile to dumpfile', error)
        throw isSystemError(error) ? storageError('write', dest, error) : readFailure(archivePath, error)
      }
      return relpath
    }

    entryLog.debug('Found symlink')
    await this.replaceWithSymlink(entry.linkname, dest, entryLog)
    return relpath
  }

  /**
   * Unlink whatever is at `dest`, so a page never writes through an old link
   */
  private async removeExisting(dest: string, log: Logger): Promise<void> {
    try {
      await unlink(dest)
    } catch (error) {
      if (!isErrnoException(error, 'ENOENT')) {
        log.error('Unable to remove existing file', error)
        throw storageError('remove', dest, error)
      }
    }
  }

  private async replaceWithSymlink(target: string, dest: string, log: Logger): Promise<void> {
    await this.removeExisting(dest, log)
    try {
      await symlink(target, dest)
    } catch (error) {
      log.error('Unable to create symlink', error)
      throw storageError('symlink', dest, error)
    }
  }
}
