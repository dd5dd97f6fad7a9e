import { StructuredError } from "../structured-error"
import { errorChain } from "./error-chain"

/** Anything carrying an identity: an ErrorTemplate or an exemplar error. */
export type ErrorIdentity = Readonly<{
  domain: string
  reason: string
}>

export type ErrorAsResult =
  | Readonly<{ found: true; error: StructuredError }>
  | Readonly<{ found: false }>

/**
 * Find the first StructuredError in the `cause` chain of `err` with the same
 * domain and reason as `target`, at any depth. Never throws.
 */
export function errorAs(err: unknown, target: ErrorIdentity): ErrorAsResult {
  for (const layer of errorChain(err, Number.POSITIVE_INFINITY)) {
    if (
      layer instanceof StructuredError &&
      layer.domain === target.domain &&
      layer.reason === target.reason
    ) {
      return { found: true, error: layer }
    }
  }

  return { found: false }
}
