/**
 * Sparse ordered set of non-negative integers.
 *
 * Stored as 32-bit words keyed by word number; only words with a member
 * set are allocated.
 *
 * @module repodata/sparse-set
 */
export class SparseIndexSet {
  private readonly words = new Map<number, number>()
  private count = 0

  /** Number of members */
  get size(): number {
    return this.count
  }

  insert(value: number): boolean {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new RangeError(`SparseIndexSet: invalid member ${value}`)
    }
    const key = Math.floor(value / 32)
    const mask = (1 << (value % 32)) >>> 0
    const current = this.words.get(key) ?? 0
    if ((current & mask) !== 0) {
      return false
    }
    this.words.set(key, (current | mask) >>> 0)
    this.count++
    return true
  }

  has(value: number): boolean {
    if (!Number.isSafeInteger(value) || value < 0) {
      return false
    }
    const current = this.words.get(Math.floor(value / 32)) ?? 0
    return (current & ((1 << (value % 32)) >>> 0)) !== 0
  }

  /** Add every member of `other` to this set */
  unionWith(other: SparseIndexSet): void {
    for (const [key, word] of other.words) {
      const current = this.words.get(key) ?? 0
      const merged = (current | word) >>> 0
      if (merged !== current) {
        this.count += popCount(merged) - popCount(current)
        this.words.set(key, merged)
      }
    }
  }

  /** Members in ascending order */
  *values(): IterableIterator<number> {
    const keys = [...this.words.keys()].sort((a, b) => a - b)
    for (const key of keys) {
      const word = this.words.get(key) ?? 0
      for (let bit = 0; bit < 32; bit++) {
        if ((word & ((1 << bit) >>> 0)) !== 0) {
          yield key * 32 + bit
        }
      }
    }
  }

  [Symbol.iterator](): IterableIterator<number> {
    return this.values()
  }
}

function popCount(word: number): number {
  let n = word >>> 0
  let count = 0
  while (n !== 0) {
    n &= n - 1
    count++
  }
  return count
}
