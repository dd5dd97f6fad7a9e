import { Code } from "../ports/code"
import type {
  HelpLink,
  LocalizedMessage,
  MetadataValue,
  RetryInfo,
  StackFrame,
} from "../ports/error"
import { Visibility } from "../ports/visibility"
import type { StackBoundary } from "./stack-trace"
import type { StructuredError } from "./structured-error"

export const SPEC_VERSION = 1

/**
 * Field values of a StructuredError while it is being built or changed.
 *
 * @internal
 */
export type ErrorState = {
  code: Code
  /** Empty means "use the code's default message". */
  message: string
  domain: string
  reason: string
  metadata: Record<string, MetadataValue>
  causes: StructuredError[]
  visibility: Visibility
  subject: string
  id: string
  time: Date | undefined
  help: { links: HelpLink[] } | undefined
  debugInfo: { stackFrames: StackFrame[]; detail: string } | undefined
  localizedMessage: LocalizedMessage | undefined
  retryInfo: RetryInfo | undefined
  sourceId: string
  /** Opaque wrapped error; `undefined` means none. */
  wrapped: unknown
}

/** Target of construction options. */
export type ErrorDraft = ErrorState & {
  /** Public entry point the caller invoked; stack capture starts below it. */
  readonly boundary: StackBoundary
}

/** The subset of fields a change option may touch. */
export type ChangeDraft = Pick<
  ErrorState,
  "metadata" | "id" | "time" | "sourceId" | "help" | "retryInfo" | "localizedMessage"
>

export function initialState(domain: string, reason: string): ErrorState {
  return {
    code: Code.Unknown,
    message: "",
    domain,
    reason,
    metadata: {},
    causes: [],
    visibility: Visibility.Internal,
    subject: "",
    id: "",
    time: undefined,
    help: undefined,
    debugInfo: undefined,
    localizedMessage: undefined,
    retryInfo: undefined,
    sourceId: "",
    wrapped: undefined,
  }
}

/**
 * Copy deep enough that changes to the copy never reach `state`.
 *
 * Metadata entries, help links and stack frames are immutable values, so only
 * their containers are cloned; nested causes are shared.
 */
export function copyState(state: ErrorState): ErrorState {
  return {
    code: state.code,
    message: state.message,
    domain: state.domain,
    reason: state.reason,
    metadata: { ...state.metadata },
    causes: [...state.causes],
    visibility: state.visibility,
    subject: state.subject,
    id: state.id,
    time: state.time && new Date(state.time.getTime()),
    help: state.help && { links: [...state.help.links] },
    debugInfo: state.debugInfo && {
      stackFrames: [...state.debugInfo.stackFrames],
      detail: state.debugInfo.detail,
    },
    localizedMessage: state.localizedMessage,
    retryInfo: state.retryInfo && copyRetryInfo(state.retryInfo),
    sourceId: state.sourceId,
    wrapped: state.wrapped,
  }
}

export function copyRetryInfo(retryInfo: RetryInfo): RetryInfo {
  return retryInfo.kind === "offset"
    ? { kind: "offset", offset: retryInfo.offset }
    : { kind: "time", time: new Date(retryInfo.time.getTime()) }
}

export function addMetadataValue(
  draft: Pick<ErrorState, "metadata">,
  visibility: Visibility,
  key: string,
  value: string,
): void {
  Object.defineProperty(draft.metadata, key, {
    value: Object.freeze({ value, visibility }),
    enumerable: true,
    writable: true,
    configurable: true,
  })
}

export function addHelpLink(
  draft: Pick<ErrorState, "help">,
  description: string,
  url: string,
): void {
  const link = Object.freeze({ description, url })

  if (draft.help) {
    draft.help.links.push(link)
  } else {
    draft.help = { links: [link] }
  }
}
