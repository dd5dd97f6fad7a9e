import type { ErrorDraft } from "../draft"
import { initialState } from "../draft"
import type { ErrorOption } from "../options"
import type { StackBoundary } from "../stack-trace"
import { StructuredError } from "../structured-error"

/** @internal Apply options in order to a fresh draft. */
export function buildError(
  domain: string,
  reason: string,
  boundary: StackBoundary,
  options: readonly ErrorOption[],
): StructuredError {
  const draft: ErrorDraft = { ...initialState(domain, reason), boundary }

  for (const option of options) {
    option(draft)
  }

  return new StructuredError(draft)
}

/**
 * Create a StructuredError identified by `domain` and `reason`.
 *
 * Starts from code UNKNOWN, an empty message (the code's default message is
 * used), visibility INTERNAL and no metadata; options apply in order.
 *
 * @example
 * ```ts
 * throw createError("accounts.users", "USER_NOT_FOUND",
 *   withCode(Code.NotFound),
 *   withMetadataValue(Visibility.Public, "userId", "123"),
 * )
 * ```
 */
export function createError(
  domain: string,
  reason: string,
  ...options: ErrorOption[]
): StructuredError {
  return buildError(domain, reason, createError, options)
}
