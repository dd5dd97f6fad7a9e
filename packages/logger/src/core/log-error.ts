import { Code, codeName, errorText, isStructuredError } from "@faultline/errors"
import type { Logger } from "../ports/logger"

/** Codes that mean this service failed rather than the caller. */
const SERVER_FAULTS: ReadonlySet<Code> = new Set([
  Code.Unknown,
  Code.Internal,
  Code.DataLoss,
  Code.Unimplemented,
])

/**
 * Log a caught value with its identity as structured fields.
 *
 * StructuredErrors are logged at `error` for server faults (UNKNOWN,
 * INTERNAL, DATA_LOSS, UNIMPLEMENTED) and at `warn` otherwise. Any other
 * value is logged at `error`.
 *
 * @example
 * ```ts
 * try {
 *   await importCatalog()
 * } catch (err) {
 *   logError(logger, err, "catalog import failed")
 * }
 * ```
 */
export function logError(logger: Logger, err: unknown, message?: string): void {
  if (!isStructuredError(err)) {
    logger.error(message ?? errorText(err), { err })
    return
  }

  const level = SERVER_FAULTS.has(err.code) ? "error" : "warn"

  logger[level](message ?? err.message, {
    err,
    domain: err.domain,
    reason: err.reason,
    code: codeName(err.code),
  })
}
