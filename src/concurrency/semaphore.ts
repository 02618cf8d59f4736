/**
 * Weighted semaphore
 *
 * Bounds a shared resource (open file descriptors) across concurrent tasks.
 * Waiters are served strictly in arrival order: a large request at the head
 * of the queue blocks smaller ones behind it.
 *
 * @module concurrency/semaphore
 */

import { CancelledError } from '../errors'

interface Waiter {
  weight: number
  resolve: () => void
  reject: (error: Error) => void
  cleanup: () => void
}

export class WeightedSemaphore {
  private current = 0
  private readonly waiters: Waiter[] = []

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`WeightedSemaphore: size must be a positive integer, got ${size}`)
    }
  }

  /** Units not currently held */
  get available(): number {
    return this.size - this.current
  }

  /** Number of blocked acquire calls */
  get pending(): number {
    return this.waiters.length
  }

  /**
   * Acquire `weight` units, waiting until they are free.
   *
   * Rejects with CancelledError if `signal` aborts first, and with a
   * RangeError if `weight` can never be satisfied.
   */
  acquire(weight = 1, signal?: AbortSignal): Promise<void> {
    if (!Number.isInteger(weight) || weight < 1 || weight > this.size) {
      return Promise.reject(new RangeError(
        `WeightedSemaphore: cannot acquire ${weight} of ${this.size} units`
      ))
    }
    if (signal?.aborted) {
      return Promise.reject(new CancelledError('acquire'))
    }
    if (this.waiters.length === 0 && this.available >= weight) {
      this.current += weight
      return Promise.resolve()
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const position = this.waiters.indexOf(waiter)
        if (position === -1) return
        this.waiters.splice(position, 1)
        reject(new CancelledError('acquire'))
        // The removed waiter may have been blocking smaller requests
        this.notify()
      }
      const waiter: Waiter = {
        weight,
        resolve,
        reject,
        cleanup: () => signal?.removeEventListener('abort', onAbort),
      }
      signal?.addEventListener('abort', onAbort, { once: true })
      this.waiters.push(waiter)
    })
  }

  /**
   * Acquire without waiting. Returns false when the units are not free or
   * other callers are already queued.
   */
  tryAcquire(weight = 1): boolean {
    if (this.waiters.length === 0 && weight >= 1 && this.available >= weight) {
      this.current += weight
      return true
    }
    return false
  }

  /**
   * Return `weight` units and wake queued callers that now fit.
   */
  release(weight = 1): void {
    if (weight > this.current || weight < 0) {
      throw new RangeError(`WeightedSemaphore: released ${weight} units but only ${this.current} are held`)
    }
    this.current -= weight
    this.notify()
  }

  private notify(): void {
    for (;;) {
      const next = this.waiters[0]
      if (next === undefined || this.available < next.weight) return
      this.waiters.shift()
      this.current += next.weight
      next.cleanup()
      next.resolve()
    }
  }
}
