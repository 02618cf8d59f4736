/**
 * Compression detection and stream decoders
 *
 * XBPS package archives are tar files wrapped in xz or zstd; repodata
 * snapshots are zstd. The wrapper is identified from its magic bytes, never
 * from the file name.
 *
 * @module archive/compression
 */

import { ReadableStream } from 'node:stream/web'
import { Decompress } from 'fzstd'
import { XzReadableStream } from 'xz-decompress'
import { throwIfCancelled } from '../concurrency/task-group'

// =============================================================================
// Detection
// =============================================================================

export type CompressionFormat = 'xz' | 'zstd' | 'unsupported'

const XZ_MAGIC = [0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00] as const
const ZSTD_MAGIC = [0x28, 0xb5, 0x2f, 0xfd] as const

/**
 * Number of leading bytes needed to identify any supported format
 */
export const SNIFF_LENGTH = XZ_MAGIC.length

function startsWith(bytes: Uint8Array, magic: readonly number[]): boolean {
  return bytes.length >= magic.length && magic.every((byte, i) => bytes[i] === byte)
}

/**
 * Identify the compression wrapper from the first bytes of a file
 */
export function detectCompression(header: Uint8Array): CompressionFormat {
  if (startsWith(header, XZ_MAGIC)) return 'xz'
  if (startsWith(header, ZSTD_MAGIC)) return 'zstd'
  return 'unsupported'
}

// =============================================================================
// Decoders
// =============================================================================

/**
 * Turns a compressed byte stream into a decompressed one
 */
export type Decoder = (
  source: AsyncIterable<Uint8Array>,
  signal?: AbortSignal
) => AsyncIterable<Uint8Array>

/**
 * Streaming zstd decoder
 */
export async function* decodeZstd(
  source: AsyncIterable<Uint8Array>,
  signal?: AbortSignal
): AsyncGenerator<Uint8Array> {
  const output: Uint8Array[] = []
  const stream = new Decompress((chunk) => {
    if (chunk.length > 0) output.push(chunk)
  })

  for await (const chunk of source) {
    throwIfCancelled(signal, 'zstd decode')
    stream.push(chunk)
    yield* output.splice(0)
  }
  stream.push(new Uint8Array(0), true)
  yield* output.splice(0)
}

/**
 * Streaming xz decoder. Input is pulled from `source` only as fast as
 * output is read.
 */
export async function* decodeXz(
  source: AsyncIterable<Uint8Array>,
  signal?: AbortSignal
): AsyncGenerator<Uint8Array> {
  const input = source[Symbol.asyncIterator]()
  const compressed = new ReadableStream<Uint8Array>({
    async pull(controller) {
      const next = await input.next()
      if (next.done) {
        controller.close()
      } else {
        controller.enqueue(next.value)
      }
    },
    async cancel() {
      await input.return?.()
    },
  })
  const reader = new XzReadableStream(compressed).getReader()

  // a reader that failed or finished needs no cancel
  let settled = false
  try {
    for (;;) {
      throwIfCancelled(signal, 'xz decode')
      const result = await reader.read().catch((error: unknown) => {
        settled = true
        throw error
      })
      if (result.done) {
        settled = true
        return
      }
      const chunk: unknown = result.value
      if (!(chunk instanceof Uint8Array)) {
        throw new TypeError('xz decoder produced a non-binary chunk')
      }
      if (chunk.length > 0) yield chunk
    }
  } finally {
    if (!settled) await reader.cancel()
  }
}

const DECODERS: Record<Exclude<CompressionFormat, 'unsupported'>, Decoder> = {
  xz: decodeXz,
  zstd: decodeZstd,
}

/**
 * Decoder for a detected format, or undefined when the format is unsupported
 */
export function decoderFor(format: CompressionFormat): Decoder | undefined {
  return format === 'unsupported' ? undefined : DECODERS[format]
}
