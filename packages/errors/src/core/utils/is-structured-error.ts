import { StructuredError } from "../structured-error"

/**
 * Type guard for StructuredError.
 *
 * @example
 * ```ts
 * catch (err) {
 *   if (isStructuredError(err)) {
 *     console.log(err.domain, err.reason)
 *   }
 * }
 * ```
 */
export function isStructuredError(value: unknown): value is StructuredError {
  return value instanceof StructuredError
}
