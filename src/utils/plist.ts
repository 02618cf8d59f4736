/**
 * Property list decoding
 *
 * XBPS writes its repository index and package manifests as property
 * lists, binary (`bplist00`) or XML. The format is chosen from the leading
 * magic bytes.
 *
 * @module utils/plist
 */

import bplist from 'bplist-parser'
import plist from 'plist'
import { type Result, Err, Ok, tryCatch } from '../types/result'

const BINARY_PLIST_MAGIC = 'bplist'

/**
 * Object table ceiling for binary lists. The parser's default (32768) is
 * below the object count of a full repository index.
 */
const MAX_BINARY_PLIST_OBJECTS = 1 << 24

Object.assign(bplist, { maxObjectCount: MAX_BINARY_PLIST_OBJECTS })

/**
 * Check for the binary property list magic
 */
export function isBinaryPropertyList(bytes: Uint8Array): boolean {
  return Buffer.from(bytes.buffer, bytes.byteOffset, Math.min(bytes.byteLength, BINARY_PLIST_MAGIC.length))
    .toString('latin1') === BINARY_PLIST_MAGIC
}

/**
 * Decode a binary or XML property list.
 *
 * @example
 * ```typescript
 * const result = parsePropertyList(bytes)
 * if (!result.ok) throw new ManifestError(result.error.message, result.error)
 * ```
 */
export function parsePropertyList(bytes: Uint8Array): Result<unknown, Error> {
  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  if (!isBinaryPropertyList(buffer)) {
    return tryCatch((): unknown => plist.parse(buffer.toString('utf8')))
  }

  const parsed = tryCatch((): unknown[] => bplist.parseBuffer(buffer))
  if (!parsed.ok) return parsed
  const [root] = parsed.value
  if (parsed.value.length !== 1 || root === undefined) {
    return Err(new Error('binary property list has no root object'))
  }
  return Ok(root)
}
