/**
 * Package records
 *
 * One record per package name in a repodata index, decoded from the
 * property list dictionary XBPS stores for it.
 *
 * @module repodata/package
 */

import { createHash, createHmac } from 'node:crypto'
import { ErrorCode, ValidationError } from '../errors'
import {
  isBoolean,
  isInteger,
  isRecord,
  isString,
  isStringArray,
  isStringArrayRecord,
} from '../utils/json-validation'
import { parsePkgVer } from './pkgver'

// =============================================================================
// Types
// =============================================================================

/**
 * A package as stored in a repository's index
 */
export interface PackageRecord {
  /** `<name>-<version>_<revision>` */
  pkgver: string
  name: string
  version: string
  revision: number

  /** Label of the repository the record was read from */
  repository: string
  architecture: string
  buildDate?: Date | undefined
  buildOptions: string
  /** SHA-256 of the package archive; the cache key */
  filenameSha256: string
  filenameSize: number
  homepage: string
  installedSize: number
  license: string
  maintainer: string
  shortDesc: string
  preserve: boolean
  sourceRevisions: string

  runDepends: string[]
  shlibRequires: string[]
  shlibProvides: string[]
  conflicts: string[]
  reverts: string[]
  replaces: string[]
  alternatives: Record<string, string[]>
  confFiles: string[]

  /** Position in the sorted catalog */
  index: number
  /** Metadata fingerprint, `W/"..."` */
  etag: string
}

/**
 * Serialized form of a package record. Empty values are left out.
 */
export interface PackageJSON {
  name?: string
  version?: string
  revision?: number
  repository?: string
  architecture?: string
  build_date?: string
  build_options?: string
  filename_sha256?: string
  filename_size?: number
  homepage?: string
  installed_size?: number
  license?: string
  maintainer?: string
  short_desc?: string
  preserve?: boolean
  source_revisions?: string
  run_depends?: string[]
  shlib_requires?: string[]
  shlib_provides?: string[]
  conflicts?: string[]
  reverts?: string[]
  replaces?: string[]
  alternatives?: Record<string, string[]>
  conf_files?: string[]
}

// =============================================================================
// Decoding
// =============================================================================

const BUILD_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}) ([A-Za-z]+|[+-]\d{4})$/

/**
 * Parse an XBPS build date (`2023-06-01 14:30 UTC`). The zone is read as UTC.
 */
export function parseBuildDate(value: string): Date | undefined {
  const match = BUILD_DATE_PATTERN.exec(value)
  if (!match) return undefined
  const [, year, month, day, hour, minute] = match.map(Number)
  if (year === undefined || month === undefined || day === undefined ||
    hour === undefined || minute === undefined) {
    return undefined
  }
  if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59) {
    return undefined
  }
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute))
  // Date.UTC rolls over out-of-range days (Feb 30 -> Mar 2)
  return date.getUTCDate() === day ? date : undefined
}

/**
 * Format a date as RFC 3339 in UTC, without fractional seconds
 */
export function formatRFC3339(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z')
}

class FieldReader {
  constructor(
    private readonly name: string,
    private readonly dict: Record<string, unknown>
  ) {}

  private fail(key: string, expected: string): never {
    throw new ValidationError(
      `package ${this.name}: field ${key} must be ${expected}`,
      ErrorCode.INVALID_FORMAT,
      { package: this.name, field: key }
    )
  }

  string(key: string): string {
    const value = this.dict[key]
    if (value === undefined) return ''
    return isString(value) ? value : this.fail(key, 'a string')
  }

  integer(key: string): number {
    const value = this.dict[key]
    if (value === undefined) return 0
    return isInteger(value) ? value : this.fail(key, 'an integer')
  }

  boolean(key: string): boolean {
    const value = this.dict[key]
    if (value === undefined) return false
    return isBoolean(value) ? value : this.fail(key, 'a boolean')
  }

  strings(key: string): string[] {
    const value = this.dict[key]
    if (value === undefined) return []
    return isStringArray(value) ? [...value] : this.fail(key, 'an array of strings')
  }

  stringsMap(key: string): Record<string, string[]> {
    const value = this.dict[key]
    if (value === undefined) return {}
    return isStringArrayRecord(value) ? { ...value } : this.fail(key, 'a dictionary of string arrays')
  }

  date(key: string): Date | undefined {
    const value = this.dict[key]
    if (value === undefined) return undefined
    if (value instanceof Date) return new Date(value.getTime())
    if (!isString(value)) return this.fail(key, 'a date string')
    return parseBuildDate(value) ?? this.fail(key, 'a date of the form YYYY-MM-DD HH:MM ZONE')
  }
}

/**
 * Decode and validate one index entry.
 *
 * The record is fully populated except for `index`, which the catalog
 * assigns after sorting.
 *
 * @throws {PkgVerError} when the pkgver cannot be parsed
 * @throws {ValidationError} when the entry or one of its fields has the wrong type
 */
export function decodePackage(name: string, value: unknown, repository: string): PackageRecord {
  if (!isRecord(value)) {
    throw new ValidationError(
      `package ${name}: entry must be a dictionary`,
      ErrorCode.INVALID_FORMAT,
      { package: name }
    )
  }

  const fields = new FieldReader(name, value)
  const pkgver = fields.string('pkgver')
  const { version, revision } = parsePkgVer(pkgver)

  const record: PackageRecord = {
    pkgver,
    name,
    version,
    revision,
    repository,
    architecture: fields.string('architecture'),
    buildDate: fields.date('build-date'),
    buildOptions: fields.string('build-options'),
    filenameSha256: fields.string('filename-sha256'),
    filenameSize: fields.integer('filename-size'),
    homepage: fields.string('homepage'),
    installedSize: fields.integer('installed_size'),
    license: fields.string('license'),
    maintainer: fields.string('maintainer'),
    shortDesc: fields.string('short_desc'),
    preserve: fields.boolean('preserve'),
    sourceRevisions: fields.string('source-revisions'),
    runDepends: fields.strings('run_depends'),
    shlibRequires: fields.strings('shlib-requires'),
    shlibProvides: fields.strings('shlib-provides'),
    conflicts: fields.strings('conflicts'),
    reverts: fields.strings('reverts'),
    replaces: fields.strings('replaces'),
    alternatives: fields.stringsMap('alternatives'),
    confFiles: fields.strings('conf_files'),
    index: 0,
    etag: '',
  }
  record.etag = computePackageETag(record)
  return record
}

// =============================================================================
// Serialization & Fingerprints
// =============================================================================

/**
 * Serialize a record with snake_case keys, omitting empty values.
 * `pkgver`, `index` and `etag` are not part of the serialized form.
 */
export function packageToJSON(record: PackageRecord): PackageJSON {
  const json: PackageJSON = {}
  if (record.name) json.name = record.name
  if (record.version) json.version = record.version
  if (record.revision) json.revision = record.revision
  if (record.repository) json.repository = record.repository
  if (record.architecture) json.architecture = record.architecture
  if (record.buildDate) json.build_date = formatRFC3339(record.buildDate)
  if (record.buildOptions) json.build_options = record.buildOptions
  if (record.filenameSha256) json.filename_sha256 = record.filenameSha256
  if (record.filenameSize) json.filename_size = record.filenameSize
  if (record.homepage) json.homepage = record.homepage
  if (record.installedSize) json.installed_size = record.installedSize
  if (record.license) json.license = record.license
  if (record.maintainer) json.maintainer = record.maintainer
  if (record.shortDesc) json.short_desc = record.shortDesc
  if (record.preserve) json.preserve = record.preserve
  if (record.sourceRevisions) json.source_revisions = record.sourceRevisions
  if (record.runDepends.length > 0) json.run_depends = [...record.runDepends]
  if (record.shlibRequires.length > 0) json.shlib_requires = [...record.shlibRequires]
  if (record.shlibProvides.length > 0) json.shlib_provides = [...record.shlibProvides]
  if (record.conflicts.length > 0) json.conflicts = [...record.conflicts]
  if (record.reverts.length > 0) json.reverts = [...record.reverts]
  if (record.replaces.length > 0) json.replaces = [...record.replaces]
  if (Object.keys(record.alternatives).length > 0) json.alternatives = { ...record.alternatives }
  if (record.confFiles.length > 0) json.conf_files = [...record.confFiles]
  return json
}

/**
 * Render a digest as a weak entity tag: `W/"<base64url>"`
 */
export function weakETag(digest: Buffer): string {
  return `W/"${digest.toString('base64url')}"`
}

/**
 * Fingerprint of a record: HMAC-SHA1 keyed by the pkgver over the SHA-1 of
 * the serialized record.
 */
export function computePackageETag(record: PackageRecord): string {
  const metadata = createHash('sha1').update(JSON.stringify(packageToJSON(record))).digest()
  return weakETag(createHmac('sha1', record.pkgver).update(metadata).digest())
}
