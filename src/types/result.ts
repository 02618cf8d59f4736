/**
 * Result Type for Type-Safe Error Handling
 *
 * Represents operations that may succeed or fail without throwing. Decoders
 * for untrusted input (cache files, property lists) return a Result so the
 * caller picks the error class that fits where the input came from.
 *
 * @example
 * ```typescript
 * function parseNumber(s: string): Result<number, string> {
 *   const n = Number(s)
 *   return Number.isNaN(n)
 *     ? Err('Invalid number')
 *     : Ok(n)
 * }
 * ```
 */

/**
 * A discriminated union representing either a successful result (Ok) or a failure (Err).
 *
 * @typeParam T - The type of the success value
 * @typeParam E - The type of the error (defaults to Error)
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

/**
 * Creates a successful Result containing the given value.
 */
export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value })

/**
 * Creates a failed Result containing the given error.
 */
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error })

/**
 * Converts a function that may throw into one that returns a Result.
 *
 * @example
 * ```typescript
 * const invalid = tryCatch(() => JSON.parse('invalid json'))
 * // invalid: { ok: false, error: SyntaxError }
 * ```
 */
export function tryCatch<T>(fn: () => T): Result<T, Error> {
  try {
    return Ok(fn())
  } catch (error) {
    return Err(error instanceof Error ? error : new Error(String(error)))
  }
}
