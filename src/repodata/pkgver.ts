/**
 * Package version strings
 *
 * XBPS identifies a package build as `<name>-<version>_<revision>`, e.g.
 * `man-pages-6.05_1`. The name may contain hyphens; the version may not.
 *
 * @module repodata/pkgver
 */

import { PkgVerError } from '../errors'

/**
 * Name, version and revision of a package build
 */
export interface PkgVer {
  name: string
  version: string
  /** Positive build revision */
  revision: number
}

const REVISION_PATTERN = /^[+-]?\d+$/

/**
 * Parse a `<name>-<version>_<revision>` string.
 *
 * @throws {PkgVerError} when any component is missing or malformed
 *
 * @example
 * ```typescript
 * parsePkgVer('man-pages-6.05_1')
 * // { name: 'man-pages', version: '6.05', revision: 1 }
 * ```
 */
export function parsePkgVer(s: string): PkgVer {
  const revSep = s.lastIndexOf('_')
  if (revSep === -1 || revSep === s.length - 1) {
    throw new PkgVerError(s, 'missing revision')
  }

  const revText = s.slice(revSep + 1)
  const revision = REVISION_PATTERN.test(revText) ? Number(revText) : NaN
  if (!Number.isSafeInteger(revision) || revision <= 0) {
    throw new PkgVerError(s, 'revision is not a valid integer >= 1')
  }

  const versionSep = s.lastIndexOf('-', revSep - 1)
  if (versionSep === -1) {
    throw new PkgVerError(s, 'missing version')
  }

  const version = s.slice(versionSep + 1, revSep)
  if (version.length === 0) {
    throw new PkgVerError(s, 'missing version')
  }
  if (version.includes(':') || version.includes('-')) {
    throw new PkgVerError(s, 'version must not contain the characters : (colon) or - (hyphen)')
  }

  const name = s.slice(0, versionSep)
  if (name.length === 0) {
    throw new PkgVerError(s, 'missing name')
  }

  return { name, version, revision }
}

/**
 * Render a PkgVer back to its string form
 */
export function formatPkgVer(pkgver: PkgVer): string {
  return `${pkgver.name}-${pkgver.version}_${pkgver.revision}`
}
