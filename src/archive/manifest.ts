/**
 * Package file manifests (`files.plist`)
 *
 * Every XBPS package lists the files, directories and links it installs.
 * The manifest decides whether a package ships manual pages before any
 * payload is extracted.
 *
 * @module archive/manifest
 */

import { posix } from 'node:path'
import { MAN_DIRS_PREFIX } from '../constants'
import { ManifestError } from '../errors'
import { isRecord, isString } from '../utils/json-validation'
import { parsePropertyList } from '../utils/plist'
import { normalizeEntryName } from './tar-reader'

export interface ManifestEntry {
  /** Absolute install path, e.g. `/usr/share/man/man1/ls.1` */
  file: string
  /** Link target, for entries under `links` */
  target?: string | undefined
}

export interface PackageManifest {
  files: ManifestEntry[]
  dirs: ManifestEntry[]
  links: ManifestEntry[]
}

function decodeEntries(key: string, value: unknown): ManifestEntry[] {
  if (value === undefined) return []
  if (!Array.isArray(value)) {
    throw new ManifestError(`files.plist: ${key} must be an array`)
  }
  return value.map((item: unknown, i) => {
    if (!isRecord(item) || !isString(item.file)) {
      throw new ManifestError(`files.plist: ${key}[${i}] must be a dictionary with a file string`)
    }
    const target = item.target
    return { file: item.file, target: isString(target) ? target : undefined }
  })
}

/**
 * Decode a `files.plist` document.
 *
 * @throws {ManifestError} when the document is not a property list of the expected shape
 */
export function parseManifest(bytes: Uint8Array): PackageManifest {
  const parsed = parsePropertyList(bytes)
  if (!parsed.ok) {
    throw new ManifestError(`files.plist: ${parsed.error.message}`, parsed.error)
  }
  const root = parsed.value
  if (!isRecord(root)) {
    throw new ManifestError('files.plist: root must be a dictionary')
  }
  return {
    files: decodeEntries('files', root.files),
    dirs: decodeEntries('dirs', root.dirs),
    links: decodeEntries('links', root.links),
  }
}

/**
 * True when the package declares a manual page section directory
 */
export function hasManDirs(manifest: PackageManifest): boolean {
  return manifest.dirs.some(dir => posix.normalize(dir.file).startsWith(MAN_DIRS_PREFIX))
}

/**
 * Archive entry names (as produced by normalizeEntryName) of the manual
 * pages and page links the manifest lists
 */
export function manPageTargets(manifest: PackageManifest): Set<string> {
  const targets = new Set<string>()
  for (const entry of [...manifest.files, ...manifest.links]) {
    if (entry.file.startsWith(MAN_DIRS_PREFIX)) {
      targets.add(normalizeEntryName('.' + entry.file))
    }
  }
  return targets
}
