/**
 * Cache ledger
 *
 * Folds the results of one run into a new cache and works out which
 * previously extracted files no package claims any more.
 *
 * Two maps are kept: the prior cache, loaded at start and never changed,
 * and the pending cache built from this run's results. Updates happen in
 * synchronous calls only, so concurrent package workers cannot interleave
 * a read-modify-write.
 *
 * @module cache/ledger
 */

import { CACHE_VERSION } from '../constants'
import type { CacheMap, CacheRecords } from './records'

// =============================================================================
// Results
// =============================================================================

/**
 * How a package was handled:
 * - `cached`: listed in the prior cache, archive not opened
 * - `extracted`: archive scanned and manual pages written
 * - `irrelevant`: archive scanned, no manual pages
 * - `skipped`: debug or multilib package, never scanned
 * - `missing`: archive file not present, recorded with no pages
 */
export type ExtractionStatus = 'cached' | 'extracted' | 'irrelevant' | 'skipped' | 'missing'

export interface ExtractionResult {
  /** Archive SHA-256, the cache key */
  hash: string
  /** Output paths, relative and `/`-separated */
  paths: string[]
  status: ExtractionStatus
}

export interface CacheLedgerOptions {
  /** Drop files of packages not seen this run (default: false) */
  prune?: boolean | undefined
}

// =============================================================================
// Ledger
// =============================================================================

export class CacheLedger {
  private readonly prior: ReadonlyMap<string, readonly string[]>
  private readonly pending = new Map<string, string[]>()
  private readonly prune: boolean

  constructor(prior: CacheMap = {}, options: CacheLedgerOptions = {}) {
    this.prior = new Map(Object.entries(prior).map(([hash, paths]): [string, string[]] => [hash, [...paths]]))
    this.prune = options.prune ?? false
  }

  /**
   * Paths the prior cache lists for `hash`, if it has the hash
   */
  lookup(hash: string): readonly string[] | undefined {
    return this.prior.get(hash)
  }

  /**
   * Append output paths for `hash` as given. With no paths, an empty entry
   * is stored so the package counts as scanned.
   */
  record(hash: string, paths: readonly string[] = []): void {
    let entry = this.pending.get(hash)
    if (entry === undefined) {
      entry = []
      this.pending.set(hash, entry)
    }
    entry.push(...paths)
  }

  /**
   * Record a worker's result. A missing archive counts as scanned with no
   * pages. Skipped packages are recorded only when the prior cache already
   * listed them.
   */
  accept(result: ExtractionResult): void {
    switch (result.status) {
      case 'cached':
      case 'extracted':
      case 'irrelevant':
      case 'missing':
        this.record(result.hash, result.paths)
        break
      case 'skipped':
        if (this.prior.has(result.hash)) this.record(result.hash, result.paths)
        break
    }
  }

  /**
   * Without pruning, keep prior entries this run did not touch.
   */
  carryForward(): void {
    if (this.prune) return
    for (const [hash, paths] of this.prior) {
      if (!this.pending.has(hash)) this.pending.set(hash, [...paths])
    }
  }

  /**
   * Paths listed by the prior cache but not by the pending one, sorted
   */
  staleFiles(): string[] {
    const live = new Set<string>()
    for (const paths of this.pending.values()) {
      for (const path of paths) live.add(path)
    }
    const stale = new Set<string>()
    for (const paths of this.prior.values()) {
      for (const path of paths) {
        if (!live.has(path)) stale.add(path)
      }
    }
    return [...stale].sort()
  }

  /**
   * Snapshot of the pending cache, hashes sorted
   */
  toRecords(): CacheRecords {
    const cache: CacheMap = Object.fromEntries(
      [...this.pending.keys()].sort().map((hash): [string, string[]] => [hash, [...(this.pending.get(hash) ?? [])]])
    )
    return { version: CACHE_VERSION, cache }
  }
}
