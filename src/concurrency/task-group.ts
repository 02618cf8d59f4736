/**
 * Fail-fast task group
 *
 * Runs tasks that share one abort signal. The first task to fail aborts the
 * signal, so siblings blocked on I/O or a semaphore stop early; `wait()`
 * rethrows that first failure once every task has settled.
 *
 * @module concurrency/task-group
 */

import { CancelledError } from '../errors'

export type Task = (signal: AbortSignal) => Promise<void>

export class TaskGroup {
  private readonly controller = new AbortController()
  private readonly running = new Set<Promise<void>>()
  private firstError: unknown
  private failed = false
  private readonly detach: () => void

  constructor(parent?: AbortSignal) {
    if (parent === undefined) {
      this.detach = () => {}
      return
    }
    const onAbort = (): void => this.fail(parent.reason ?? new CancelledError())
    if (parent.aborted) {
      onAbort()
      this.detach = () => {}
    } else {
      parent.addEventListener('abort', onAbort, { once: true })
      this.detach = () => parent.removeEventListener('abort', onAbort)
    }
  }

  /** Signal handed to every task; aborted on the first failure */
  get signal(): AbortSignal {
    return this.controller.signal
  }

  /**
   * Start a task in the group.
   */
  spawn(task: Task): void {
    const promise = Promise.resolve()
      .then(() => task(this.controller.signal))
      .catch((error: unknown) => this.fail(error))
      .finally(() => {
        this.running.delete(promise)
      })
    this.running.add(promise)
  }

  /**
   * Wait for every started task, including ones started while waiting.
   *
   * @throws the first error raised by a task, or the parent's abort reason
   */
  async wait(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all(this.running)
    }
    this.detach()
    if (this.failed) {
      throw this.firstError
    }
  }

  private fail(error: unknown): void {
    if (!this.failed) {
      this.failed = true
      this.firstError = error
      this.controller.abort(error)
    }
  }
}

/**
 * Throw CancelledError when the signal has been aborted.
 */
export function throwIfCancelled(signal: AbortSignal | undefined, operation?: string): void {
  if (signal?.aborted) {
    throw new CancelledError(operation)
  }
}
