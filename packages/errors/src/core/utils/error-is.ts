import type { ErrorMatcher } from "../../ports/error"
import { StructuredError } from "../structured-error"
import { errorChain } from "./error-chain"

function isMatcher(v: unknown): v is ErrorMatcher {
  return typeof v === "object" && v !== null && "is" in v && typeof v.is === "function"
}

/**
 * Whether any layer of the `cause` chain of `err` is `target`, or declares
 * itself equivalent to it through an `is(target)` method.
 *
 * StructuredError layers are compared by domain and reason here rather than
 * through their own `is`, so every layer is visited once whatever the depth.
 *
 * @example
 * ```ts
 * if (errorIs(err, UserNotFound.newError())) {
 *   return res.status(404).end()
 * }
 * ```
 */
export function errorIs(err: unknown, target: unknown): boolean {
  for (const layer of errorChain(err, Number.POSITIVE_INFINITY)) {
    if (layer === target) return true

    if (layer instanceof StructuredError) {
      if (
        target instanceof StructuredError &&
        layer.domain === target.domain &&
        layer.reason === target.reason
      ) {
        return true
      }
      continue
    }

    if (isMatcher(layer) && layer.is(target) === true) return true
  }

  return false
}
