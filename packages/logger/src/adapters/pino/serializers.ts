import { isStructuredError, type SerializeOptions, serializeError } from "@faultline/errors"
import { errWithCause } from "pino-std-serializers"

/**
 * pino `err` serializer.
 *
 * StructuredErrors keep their domain, reason, code and metadata; other
 * errors go through `errWithCause`; anything else is logged as given.
 */
export function createErrSerializer(options?: SerializeOptions): (err: unknown) => unknown {
  return (err) => {
    if (isStructuredError(err)) return serializeError(err, options)
    if (err instanceof Error) return errWithCause(err)
    return err
  }
}
