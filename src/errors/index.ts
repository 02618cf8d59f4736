/**
 * Mandump Error Handling Module
 *
 * Provides a standardized error hierarchy for the whole tool.
 * All errors extend from MandumpError which provides:
 * - Error codes for programmatic handling
 * - Context data for log fields
 * - Cause chaining for debugging
 * - Type guards for error checking
 *
 * Error Hierarchy:
 * - MandumpError (base class)
 *   - ValidationError (malformed repodata, pkgver, manifest or archive)
 *     - PkgVerError
 *     - NoIndexError
 *     - ManifestError
 *     - UnsupportedCompressionError
 *   - NotFoundError (missing repodata or package files)
 *     - FileNotFoundError
 *   - StorageError (filesystem failures while extracting)
 *     - PathTraversalError
 *   - ConfigurationError (invalid flags or cache file)
 *   - CancelledError (batch aborted by a sibling failure)
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for mandump operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',
  CANCELLED = 'CANCELLED',

  // Malformed input
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  INVALID_FORMAT = 'INVALID_FORMAT',
  MALFORMED_PKGVER = 'MALFORMED_PKGVER',
  INDEX_NOT_FOUND = 'INDEX_NOT_FOUND',
  MALFORMED_MANIFEST = 'MALFORMED_MANIFEST',
  UNSUPPORTED_COMPRESSION = 'UNSUPPORTED_COMPRESSION',

  // Not found
  NOT_FOUND = 'NOT_FOUND',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',

  // Storage
  STORAGE_ERROR = 'STORAGE_ERROR',
  STORAGE_READ_ERROR = 'STORAGE_READ_ERROR',
  STORAGE_WRITE_ERROR = 'STORAGE_WRITE_ERROR',
  PATH_TRAVERSAL = 'PATH_TRAVERSAL',

  // Configuration
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format, used when an error is written as a log field
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Additional context data */
  context?: Record<string, unknown> | undefined
  /** Serialized cause (if error chaining) */
  cause?: SerializedError | { name: string; message: string } | undefined
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all mandump errors.
 *
 * @example
 * ```typescript
 * throw new MandumpError('Operation failed', ErrorCode.INTERNAL, {
 *   file: 'x86_64-repodata',
 * })
 * ```
 */
export class MandumpError extends Error {
  override readonly name: string = 'MandumpError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error | undefined

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Serialize error for structured logs
   */
  toJSON(): SerializedError {
    let cause: SerializedError['cause']
    if (this.cause instanceof MandumpError) {
      cause = this.cause.toJSON()
    } else if (this.cause) {
      cause = { name: this.cause.name, message: this.cause.message }
    }
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause,
    }
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when input is malformed.
 *
 * Used for:
 * - Repodata index entries with the wrong shape
 * - Package manifests that cannot be decoded
 * - Archives in an unknown compression format
 */
export class ValidationError extends MandumpError {
  override readonly name: string = 'ValidationError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_FAILED,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Reasons a pkgver string can be rejected.
 */
export type PkgVerProblem =
  | 'missing name'
  | 'missing version'
  | 'missing revision'
  | 'revision is not a valid integer >= 1'
  | 'version must not contain the characters : (colon) or - (hyphen)'

/**
 * Error thrown when a `<name>-<version>_<revision>` string cannot be parsed.
 */
export class PkgVerError extends ValidationError {
  override readonly name = 'PkgVerError'

  constructor(pkgver: string, problem: PkgVerProblem) {
    super(
      `pkgver: cannot parse ${JSON.stringify(pkgver)}: ${problem}`,
      ErrorCode.MALFORMED_PKGVER,
      { pkgver, problem }
    )
    Object.setPrototypeOf(this, PkgVerError.prototype)
  }

  get pkgver(): string {
    return String(this.context.pkgver)
  }

  get problem(): string {
    return String(this.context.problem)
  }
}

/**
 * Error thrown when a repodata archive holds no index property list.
 */
export class NoIndexError extends ValidationError {
  override readonly name = 'NoIndexError'

  constructor(entryName: string) {
    super(`index not found: ${entryName}`, ErrorCode.INDEX_NOT_FOUND, { entry: entryName })
    Object.setPrototypeOf(this, NoIndexError.prototype)
  }
}

/**
 * Error thrown when a package's files manifest cannot be decoded.
 */
export class ManifestError extends ValidationError {
  override readonly name = 'ManifestError'

  constructor(message: string, cause?: Error) {
    super(message, ErrorCode.MALFORMED_MANIFEST, {}, cause)
    Object.setPrototypeOf(this, ManifestError.prototype)
  }
}

/**
 * Error thrown when a package archive is compressed with something other
 * than xz or zstd.
 */
export class UnsupportedCompressionError extends ValidationError {
  override readonly name = 'UnsupportedCompressionError'

  constructor(path: string) {
    super(
      `Compression format for ${path} is not supported`,
      ErrorCode.UNSUPPORTED_COMPRESSION,
      { path }
    )
    Object.setPrototypeOf(this, UnsupportedCompressionError.prototype)
  }
}

// =============================================================================
// Not Found Errors
// =============================================================================

/**
 * Error thrown when a requested resource is not found.
 */
export class NotFoundError extends MandumpError {
  override readonly name: string = 'NotFoundError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NOT_FOUND,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Error thrown when a file does not exist.
 */
export class FileNotFoundError extends NotFoundError {
  override readonly name = 'FileNotFoundError'

  constructor(path: string, cause?: Error) {
    super(`File not found: ${path}`, ErrorCode.FILE_NOT_FOUND, { path }, cause)
    Object.setPrototypeOf(this, FileNotFoundError.prototype)
  }

  get path(): string {
    return String(this.context.path)
  }
}

// =============================================================================
// Storage Errors
// =============================================================================

/**
 * Error thrown when a filesystem operation fails.
 */
export class StorageError extends MandumpError {
  override readonly name: string = 'StorageError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.STORAGE_ERROR,
    context?: {
      path?: string
      operation?: string
    },
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, new.target.prototype)
  }

  get path(): string | undefined {
    const path = this.context.path
    return typeof path === 'string' ? path : undefined
  }

  get operation(): string | undefined {
    const operation = this.context.operation
    return typeof operation === 'string' ? operation : undefined
  }
}

/**
 * Error thrown when a path would leave the output directory.
 */
export class PathTraversalError extends StorageError {
  override readonly name = 'PathTraversalError'

  constructor(path: string, cause?: Error) {
    super(`Path traversal attempt detected: ${path}`, ErrorCode.PATH_TRAVERSAL, { path }, cause)
    Object.setPrototypeOf(this, PathTraversalError.prototype)
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends MandumpError {
  override readonly name = 'ConfigurationError'

  constructor(
    message: string,
    context?: {
      configKey?: string
      expectedValue?: unknown
      actualValue?: unknown
    },
    cause?: Error
  ) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context, cause)
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }

  get configKey(): string | undefined {
    const key = this.context.configKey
    return typeof key === 'string' ? key : undefined
  }
}

// =============================================================================
// Cancellation
// =============================================================================

/**
 * Error used to abort work after another task in the batch failed.
 */
export class CancelledError extends MandumpError {
  override readonly name = 'CancelledError'

  constructor(operation = 'operation', cause?: Error) {
    super(`${operation} cancelled`, ErrorCode.CANCELLED, { operation }, cause)
    Object.setPrototypeOf(this, CancelledError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is a MandumpError
 */
export function isMandumpError(error: unknown): error is MandumpError {
  return error instanceof MandumpError
}

/**
 * Check if an error is a NotFoundError (or any subclass)
 */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError ||
    (isMandumpError(error) && (error.code === ErrorCode.NOT_FOUND || error.code === ErrorCode.FILE_NOT_FOUND))
}

/**
 * Check if an error came from a failed system call with the given errno code.
 *
 * @example
 * ```typescript
 * try {
 *   await unlink(path)
 * } catch (error) {
 *   if (!isErrnoException(error, 'ENOENT')) throw error
 * }
 * ```
 */
export function isErrnoException(error: unknown, code?: string): error is NodeJS.ErrnoException {
  if (!(error instanceof Error) || !('code' in error) || typeof error.code !== 'string') {
    return false
  }
  return code === undefined || error.code === code
}

/**
 * Check if an error came from a system call (has an errno code and the
 * syscall that failed). Native add-on errors also carry a string `code`
 * and are not system errors.
 */
export function isSystemError(error: unknown): error is NodeJS.ErrnoException & { syscall: string } {
  return isErrnoException(error) && typeof error.syscall === 'string'
}

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Turn a filesystem failure into a StorageError carrying the path and the
 * operation that failed.
 */
export function storageError(operation: string, path: string, error: unknown): StorageError {
  const cause = error instanceof Error ? error : undefined
  const reason = error instanceof Error ? error.message : String(error)
  const code = operation === 'read' || operation === 'open'
    ? ErrorCode.STORAGE_READ_ERROR
    : ErrorCode.STORAGE_WRITE_ERROR
  return new StorageError(`Unable to ${operation} ${path}: ${reason}`, code, { path, operation }, cause)
}
