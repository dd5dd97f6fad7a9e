import type { SerializedStructuredError } from "../ports/error"
import { codeHttpStatus, codeName, visibilityName } from "./code-info"
import { formatDuration, formatRfc3339 } from "./format"
import { stackEntries } from "./stack-trace"
import { StructuredError } from "./structured-error"
import { errorText } from "./utils/error-text"

/**
 * Options for error serialization.
 */
export type SerializeOptions = Readonly<{
  /** Include debug detail and stack entries. Default: false */
  includeDebug?: boolean
}>

function serializeWrapped(
  wrapped: unknown,
  options: SerializeOptions | undefined,
): NonNullable<SerializedStructuredError["wrapped"]> {
  if (wrapped instanceof StructuredError) return serializeError(wrapped, options)
  if (wrapped instanceof Error) return { name: wrapped.name, message: errorText(wrapped) }

  return { name: "NonErrorThrown", message: errorText(wrapped) }
}

/**
 * Serialize a StructuredError to a JSON-safe shape for log pipelines.
 *
 * Optional fields are present only when set. Visibility and code are rendered
 * by name; times as RFC 3339.
 */
export function serializeError(
  err: StructuredError,
  options?: SerializeOptions,
): SerializedStructuredError {
  const includeDebug = options?.includeDebug ?? false
  const { time, retryInfo, help, localizedMessage, debugInfo } = err

  const metadata: SerializedStructuredError["metadata"] = {}
  for (const [key, entry] of Object.entries(err.metadata)) {
    Object.defineProperty(metadata, key, {
      value: { value: entry.value, visibility: visibilityName(entry.visibility) },
      enumerable: true,
      writable: true,
      configurable: true,
    })
  }

  return {
    name: err.name,
    specVersion: err.specVersion,
    code: codeName(err.code),
    status: codeHttpStatus(err.code),
    message: err.message,
    domain: err.domain,
    reason: err.reason,
    visibility: visibilityName(err.visibility),
    metadata,
    causes: err.causes.map((cause) => serializeError(cause, options)),
    ...(err.subject !== "" && { subject: err.subject }),
    ...(err.id !== "" && { id: err.id }),
    ...(time && { time: formatRfc3339(time) }),
    ...(err.sourceId !== "" && { sourceId: err.sourceId }),
    ...(help && help.links.length > 0 && { help: help.links.map((link) => ({ ...link })) }),
    ...(localizedMessage && { localizedMessage: { ...localizedMessage } }),
    ...(retryInfo && {
      retryInfo:
        retryInfo.kind === "offset"
          ? { retryOffset: formatDuration(retryInfo.offset) }
          : { retryTime: formatRfc3339(retryInfo.time) },
    }),
    ...(err.cause !== undefined && { wrapped: serializeWrapped(err.cause, options) }),
    ...(includeDebug &&
      debugInfo && { debugInfo: { detail: debugInfo.detail, stack: stackEntries(debugInfo) } }),
  }
}
