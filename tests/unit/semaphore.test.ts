/**
 * Weighted semaphore tests
 */

import { setImmediate as tick } from 'node:timers/promises'
import { describe, it, expect } from 'vitest'
import { WeightedSemaphore } from '../../src/concurrency/semaphore'
import { CancelledError } from '../../src/errors'

describe('WeightedSemaphore', () => {
  it('should require a positive integer size', () => {
    expect(() => new WeightedSemaphore(0)).toThrow(RangeError)
    expect(() => new WeightedSemaphore(1.5)).toThrow(RangeError)
  })

  it('should grant free units immediately', async () => {
    const sem = new WeightedSemaphore(3)
    await sem.acquire(2)
    expect(sem.available).toBe(1)
    expect(sem.tryAcquire(2)).toBe(false)
    expect(sem.tryAcquire(1)).toBe(true)
    expect(sem.available).toBe(0)
  })

  it('should serve waiters in arrival order', async () => {
    const sem = new WeightedSemaphore(2)
    const order: string[] = []
    await sem.acquire(2)

    const big = sem.acquire(2).then(() => order.push('big'))
    const small = sem.acquire(1).then(() => order.push('small'))
    expect(sem.pending).toBe(2)

    sem.release(1)
    await tick()
    // One unit is free, but the larger request is first in line
    expect(order).toEqual([])
    expect(sem.tryAcquire(1)).toBe(false)

    sem.release(1)
    await big
    expect(order).toEqual(['big'])
    expect(sem.pending).toBe(1)

    sem.release(2)
    await small
    expect(order).toEqual(['big', 'small'])
    expect(sem.available).toBe(1)
  })

  it('should reject a waiter whose signal aborts', async () => {
    const sem = new WeightedSemaphore(1)
    await sem.acquire(1)
    const controller = new AbortController()

    const waiting = sem.acquire(1, controller.signal)
    controller.abort()

    await expect(waiting).rejects.toThrow(CancelledError)
    expect(sem.pending).toBe(0)
    expect(sem.available).toBe(0)
  })

  it('should wake smaller waiters when a blocking waiter aborts', async () => {
    const sem = new WeightedSemaphore(3)
    await sem.acquire(2)
    const controller = new AbortController()

    const big = sem.acquire(3, controller.signal)
    const small = sem.acquire(1)
    controller.abort()

    await expect(big).rejects.toThrow(CancelledError)
    await small
    expect(sem.available).toBe(0)
  })

  it('should reject an already aborted signal', async () => {
    const sem = new WeightedSemaphore(2)
    const controller = new AbortController()
    controller.abort()
    await expect(sem.acquire(1, controller.signal)).rejects.toThrow('acquire cancelled')
    expect(sem.available).toBe(2)
  })

  it('should reject weights that can never fit', async () => {
    const sem = new WeightedSemaphore(2)
    await expect(sem.acquire(5)).rejects.toThrow('WeightedSemaphore: cannot acquire 5 of 2 units')
    await expect(sem.acquire(0)).rejects.toThrow(RangeError)
  })

  it('should reject releasing more than is held', async () => {
    const sem = new WeightedSemaphore(2)
    await sem.acquire(1)
    expect(() => sem.release(2)).toThrow(RangeError)
  })
})
