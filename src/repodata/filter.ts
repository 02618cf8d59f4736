/**
 * Catalog filtering
 *
 * Large catalogs are split into chunks that are scanned as separate tasks.
 * Each task collects the global indices of its matches; the union of those
 * sets is emitted in ascending index order, so the result never depends on
 * which chunk finished first.
 *
 * @module repodata/filter
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises'
import { FILTER_SPLIT_SIZE, MIN_SPLIT_FILTER } from '../constants'
import { SparseIndexSet } from './sparse-set'

/**
 * Filter predicate. Must not modify the record.
 */
export type FilterFunc<T> = (record: T) => boolean

/**
 * Return the records matching `predicate`, in input order.
 */
export async function filterPackages<T>(
  records: readonly T[],
  predicate: FilterFunc<T>
): Promise<T[]> {
  if (records.length < MIN_SPLIT_FILTER) {
    return records.filter(record => predicate(record))
  }
  return splitFilter(records, predicate)
}

async function splitFilter<T>(records: readonly T[], predicate: FilterFunc<T>): Promise<T[]> {
  const tasks: Promise<SparseIndexSet>[] = []
  for (let start = 0; start < records.length; start += FILTER_SPLIT_SIZE) {
    const end = Math.min(start + FILTER_SPLIT_SIZE, records.length)
    tasks.push(filterChunk(records, start, end, predicate))
  }

  const index = new SparseIndexSet()
  for (const subset of await Promise.all(tasks)) {
    index.unionWith(subset)
  }

  const result: T[] = []
  for (const i of index) {
    const record = records[i]
    if (record !== undefined) result.push(record)
  }
  return result
}

async function filterChunk<T>(
  records: readonly T[],
  start: number,
  end: number,
  predicate: FilterFunc<T>
): Promise<SparseIndexSet> {
  await yieldToEventLoop()
  const subset = new SparseIndexSet()
  for (let i = start; i < end; i++) {
    const record = records[i]
    if (record !== undefined && predicate(record)) {
      subset.insert(i)
    }
  }
  return subset
}
