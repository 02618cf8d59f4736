/**
 * JSON Validation Utilities
 *
 * Type guards and safe parsing for data read back from disk (the cache
 * file) or decoded from property lists.
 *
 * @module utils/json-validation
 */

import { type Result, Err, tryCatch } from '../types/result'

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if a value is a plain object (not null, array, Date or Buffer)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) &&
    !(value instanceof Date) && !(value instanceof Uint8Array)
}

/**
 * Check if a value is a string
 */
export function isString(value: unknown): value is string {
  return typeof value === 'string'
}

/**
 * Check if a value is a number (including finite check)
 */
export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}

/**
 * Check if a value is an integer
 */
export function isInteger(value: unknown): value is number {
  return isNumber(value) && Number.isInteger(value)
}

/**
 * Check if a value is a boolean
 */
export function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean'
}

/**
 * Check if a value is an array of strings
 */
export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(isString)
}

/**
 * Check if a value maps string keys to string arrays
 */
export function isStringArrayRecord(value: unknown): value is Record<string, string[]> {
  return isRecord(value) && Object.values(value).every(isStringArray)
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when JSON parsing fails
 */
export class JsonParseError extends Error {
  public readonly input: string
  public override readonly cause?: Error | undefined

  constructor(
    message: string,
    input: string,
    cause?: Error
  ) {
    super(message)
    this.name = 'JsonParseError'
    this.input = input
    this.cause = cause
  }
}

// =============================================================================
// Safe Parsing Functions
// =============================================================================

/**
 * Safely parse JSON and return a Result
 *
 * @example
 * ```typescript
 * const result = safeJsonParse('{"version": 1}')
 * if (result.ok) {
 *   console.log(result.value) // { version: 1 }
 * }
 * ```
 */
export function safeJsonParse(json: string): Result<unknown, JsonParseError> {
  const result = tryCatch((): unknown => JSON.parse(json))
  if (result.ok) {
    return result
  }
  return Err(new JsonParseError(
    `Failed to parse JSON: ${result.error.message}`,
    json.length > 100 ? json.slice(0, 100) + '...' : json,
    result.error
  ))
}
