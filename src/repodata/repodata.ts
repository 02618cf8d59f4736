/**
 * Repository catalog
 *
 * Loads the package index of an XBPS repodata snapshot (a zstd-compressed
 * tar holding `index.plist`) and keeps it as a sorted, fingerprinted
 * catalog. Several snapshots can be merged into one catalog; a later
 * record replaces an earlier one of the same name.
 *
 * @module repodata/repodata
 */

import { createHash } from 'node:crypto'
import { type FileHandle, open } from 'node:fs/promises'
import { decodeZstd } from '../archive/compression'
import { TarReader, readEntry } from '../archive/tar-reader'
import { DEFAULT_REPOSITORY, REPO_INDEX_FILE } from '../constants'
import {
  ErrorCode,
  FileNotFoundError,
  NoIndexError,
  ValidationError,
  isErrnoException,
  storageError,
} from '../errors'
import { isRecord } from '../utils/json-validation'
import { parsePropertyList } from '../utils/plist'
import { type FilterFunc, filterPackages } from './filter'
import { type PackageRecord, decodePackage, weakETag } from './package'

export class RepoData {
  private readonly root = new Map<string, PackageRecord>()
  private records: PackageRecord[] = []
  private names: string[] = []
  private aggregateETag = ''

  /**
   * Load a repodata snapshot from disk.
   *
   * @param repo - Repository label for every record (default: `current`)
   * @throws {FileNotFoundError} when `path` does not exist
   */
  async loadRepo(path: string, repo?: string, signal?: AbortSignal): Promise<void> {
    let handle: FileHandle
    try {
      handle = await open(path, 'r')
    } catch (error) {
      if (isErrnoException(error, 'ENOENT')) {
        throw new FileNotFoundError(path, error)
      }
      throw storageError('open', path, error)
    }
    const stream = handle.createReadStream({ autoClose: false })
    try {
      await this.readRepo(stream, repo, signal)
    } finally {
      stream.destroy()
      await handle.close()
    }
  }

  /**
   * Read a repodata snapshot from a zstd-compressed tar byte stream.
   *
   * @throws {NoIndexError} when the archive has no `index.plist`
   */
  async readRepo(source: AsyncIterable<Uint8Array>, repo?: string, signal?: AbortSignal): Promise<void> {
    const reader = new TarReader(decodeZstd(source, signal), signal)
    try {
      for (let entry = await reader.next(); entry; entry = await reader.next()) {
        if (entry.name === REPO_INDEX_FILE) {
          this.readRepoIndex(await readEntry(entry), repo)
          return
        }
      }
    } finally {
      await reader.close()
    }
    throw new NoIndexError(REPO_INDEX_FILE)
  }

  /**
   * Merge an `index.plist` document into the catalog.
   *
   * Every entry is decoded before anything is merged, so a malformed entry
   * leaves the catalog as it was.
   *
   * @throws {PkgVerError} when an entry's pkgver cannot be parsed
   * @throws {ValidationError} when the document or an entry is malformed
   */
  readRepoIndex(bytes: Uint8Array, repo?: string): void {
    const repository = repo || DEFAULT_REPOSITORY
    const parsed = parsePropertyList(bytes)
    if (!parsed.ok) {
      throw new ValidationError(
        `${REPO_INDEX_FILE}: ${parsed.error.message}`,
        ErrorCode.INVALID_FORMAT,
        { entry: REPO_INDEX_FILE },
        parsed.error
      )
    }
    if (!isRecord(parsed.value)) {
      throw new ValidationError(
        `${REPO_INDEX_FILE}: root must be a dictionary`,
        ErrorCode.INVALID_FORMAT,
        { entry: REPO_INDEX_FILE }
      )
    }

    const decoded = Object.entries(parsed.value).map(([name, value]) => decodePackage(name, value, repository))

    const index = [...this.records]
    for (const record of decoded) {
      const old = this.root.get(record.name)
      this.root.set(record.name, record)
      if (old) {
        index[old.index] = record
      } else {
        index.push(record)
      }
    }

    // Array.prototype.sort is stable
    index.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    index.forEach((record, i) => {
      record.index = i
    })

    this.records = index
    this.names = index.map(record => record.name)
    this.aggregateETag = computeAggregateETag(index)
  }

  /**
   * All records, ordered by name. Callers must not modify them.
   */
  index(): readonly PackageRecord[] {
    return this.records
  }

  /**
   * Package names, without version and revision, in catalog order
   */
  nameIndex(): readonly string[] {
    return this.names
  }

  /**
   * The record named `name`, if any
   */
  package(name: string): PackageRecord | undefined {
    return this.root.get(name)
  }

  /**
   * Fingerprint of the whole catalog; empty before the first merge
   */
  etag(): string {
    return this.aggregateETag
  }

  get size(): number {
    return this.records.length
  }

  /**
   * Records matching `predicate`, in catalog order
   */
  filter(predicate: FilterFunc<PackageRecord>): Promise<PackageRecord[]> {
    return filterPackages(this.records, predicate)
  }
}

function int64LE(value: number): Buffer {
  const buf = Buffer.alloc(8)
  buf.writeBigInt64LE(BigInt(value))
  return buf
}

/**
 * SHA-1 over the record count and each record's pkgver and fingerprint,
 * each prefixed with their combined byte length
 */
export function computeAggregateETag(records: readonly PackageRecord[]): string {
  const hash = createHash('sha1')
  hash.update(int64LE(records.length))
  for (const record of records) {
    const pkgver = Buffer.from(record.pkgver, 'utf8')
    const etag = Buffer.from(record.etag, 'utf8')
    hash.update(int64LE(pkgver.length + etag.length))
    hash.update(pkgver)
    hash.update(etag)
  }
  return weakETag(hash.digest())
}
