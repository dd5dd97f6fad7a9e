import { type ErrorOption, withErrorMessage, withWrap } from "../options"
import type { ErrorTemplate } from "../template"
import { StructuredError } from "../structured-error"

/**
 * Convert any thrown value to a StructuredError.
 *
 * - StructuredError passes through unchanged
 * - Anything else becomes a new error from `template`, wrapping the value and
 *   using its text as the message
 *
 * @param err - The caught value
 * @param template - Identity and defaults for the new error
 * @param options - Applied after the template's defaults
 */
export function toStructuredError(
  err: unknown,
  template: ErrorTemplate,
  ...options: ErrorOption[]
): StructuredError {
  if (err instanceof StructuredError) {
    return err
  }

  return template.newError(withErrorMessage(err), withWrap(err), ...options)
}
