/**
 * Pull-based tar reader
 *
 * Wraps the push-based tar-stream extractor so callers can walk entries
 * with `await reader.next()`, stop at any point, and read or skip each
 * entry body.
 *
 * @module archive/tar-reader
 */

import { once } from 'node:events'
import { posix } from 'node:path'
import type { Readable } from 'node:stream'
import * as tar from 'tar-stream'
import { CancelledError } from '../errors'

// =============================================================================
// Types
// =============================================================================

/**
 * Entry kinds the extractor cares about; everything else is `other`
 */
export type TarEntryType = 'file' | 'symlink' | 'directory' | 'other'

export interface TarEntry {
  /** Entry name as stored in the archive */
  rawName: string
  /** Cleaned name: `./usr/share/man/man1/ls.1` becomes `usr/share/man/man1/ls.1` */
  name: string
  type: TarEntryType
  /** Symlink target, empty for other types */
  linkname: string
  size: number
  /** Entry body; must be consumed fully or left to the reader to skip */
  body: AsyncIterable<Uint8Array>
}

interface PendingEntry {
  header: tar.Headers
  stream: Readable
  next: () => void
}

/**
 * Clean an archive entry name the way a path is cleaned: collapse `.`,
 * `..` and repeated separators and drop a trailing slash.
 */
export function normalizeEntryName(name: string): string {
  const cleaned = posix.normalize(name)
  if (cleaned === './' || cleaned === '.') return '.'
  const trimmed = cleaned.length > 1 && cleaned.endsWith('/') ? cleaned.slice(0, -1) : cleaned
  return trimmed.startsWith('./') ? trimmed.slice(2) : trimmed
}

function entryType(header: tar.Headers): TarEntryType {
  switch (header.type) {
    case 'file':
    case 'contiguous-file':
      return 'file'
    case 'symlink':
      return 'symlink'
    case 'directory':
      return 'directory'
    default:
      return 'other'
  }
}

async function* bodyChunks(stream: Readable): AsyncGenerator<Uint8Array> {
  for await (const chunk of stream) {
    if (chunk instanceof Uint8Array) {
      yield chunk
    } else {
      yield Buffer.from(String(chunk))
    }
  }
}

// =============================================================================
// Reader
// =============================================================================

/**
 * Reads tar entries from a byte stream.
 *
 * @example
 * ```typescript
 * const reader = new TarReader(decodeZstd(source), signal)
 * try {
 *   for (let entry = await reader.next(); entry; entry = await reader.next()) {
 *     if (entry.name === 'index.plist') return await readEntry(entry)
 *   }
 * } finally {
 *   await reader.close()
 * }
 * ```
 */
export class TarReader {
  private readonly extract = tar.extract()
  private readonly controller = new AbortController()
  private readonly queue: PendingEntry[] = []
  private current: PendingEntry | undefined
  private wake: (() => void) | undefined
  private finished = false
  private failure: unknown
  private failed = false
  private closed = false
  private readonly pump: Promise<void>
  private readonly detachSignal: () => void

  constructor(source: AsyncIterable<Uint8Array>, signal?: AbortSignal) {
    this.extract.on('entry', (header: tar.Headers, stream: Readable, next: () => void) => {
      // Body errors are reported again by the extractor's 'error' event
      stream.on('error', (error: unknown) => this.fail(error))
      this.queue.push({ header, stream, next })
      this.notify()
    })
    this.extract.on('finish', () => {
      this.finished = true
      this.notify()
    })
    this.extract.on('error', (error: unknown) => this.fail(error))
    this.extract.on('close', () => {
      if (!this.finished) this.fail(new CancelledError('archive read'))
    })

    if (signal) {
      const onAbort = (): void => this.fail(new CancelledError('archive read'))
      if (signal.aborted) onAbort()
      signal.addEventListener('abort', onAbort, { once: true })
      this.detachSignal = () => signal.removeEventListener('abort', onAbort)
    } else {
      this.detachSignal = () => {}
    }

    this.pump = this.feed(source)
  }

  /**
   * Advance to the next entry. The body of the previous entry is skipped if
   * it was not read. Resolves to undefined at the end of the archive.
   *
   * @throws the decoder, source or tar parse error, or CancelledError
   */
  async next(): Promise<TarEntry | undefined> {
    this.release()
    for (;;) {
      if (this.failed) throw this.failure
      const pending = this.queue.shift()
      if (pending) {
        this.current = pending
        const { header, stream } = pending
        return {
          rawName: header.name,
          name: normalizeEntryName(header.name),
          type: entryType(header),
          linkname: header.linkname ?? '',
          size: header.size ?? 0,
          body: bodyChunks(stream),
        }
      }
      if (this.finished) return undefined
      await new Promise<void>(resolve => {
        this.wake = resolve
      })
    }
  }

  /**
   * Stop reading and release the source. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (!this.closed) {
      this.closed = true
      this.controller.abort()
      this.extract.destroy()
      this.detachSignal()
    }
    await this.pump
  }

  private async feed(source: AsyncIterable<Uint8Array>): Promise<void> {
    try {
      for await (const chunk of source) {
        if (this.closed || this.failed) return
        if (!this.extract.write(chunk)) {
          await once(this.extract, 'drain', { signal: this.controller.signal })
        }
      }
      if (!this.closed && !this.failed) this.extract.end()
    } catch (error) {
      if (!this.closed) this.fail(error)
    }
  }

  private release(): void {
    const current = this.current
    if (current) {
      this.current = undefined
      current.stream.resume()
      current.next()
    }
  }

  private fail(error: unknown): void {
    if (!this.failed) {
      this.failed = true
      this.failure = error
      this.controller.abort()
      this.extract.destroy()
    }
    this.notify()
  }

  private notify(): void {
    const wake = this.wake
    this.wake = undefined
    wake?.()
  }
}

/**
 * Read an entry body into memory
 */
export async function readEntry(entry: TarEntry): Promise<Buffer> {
  const chunks: Uint8Array[] = []
  for await (const chunk of entry.body) {
    chunks.push(chunk)
  }
  return Buffer.concat(chunks)
}
