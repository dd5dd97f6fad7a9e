import type { Code } from "../ports/code"
import type { DebugInfo, Help, Metadata, Milliseconds } from "../ports/error"
import type { Visibility } from "../ports/visibility"
import { addHelpLink, addMetadataValue, type ErrorDraft } from "./draft"
import { captureStackFrames, DEFAULT_STACK_DEPTH } from "./stack-trace"
import type { StructuredError } from "./structured-error"
import { errorText } from "./utils/error-text"

/**
 * A construction option.
 *
 * Options run in argument order against a fresh draft. They never throw.
 */
export type ErrorOption = (draft: ErrorDraft) => void

export function withCode(code: Code): ErrorOption {
  return (draft) => {
    draft.code = code
  }
}

export function withMessage(message: string): ErrorOption {
  return (draft) => {
    draft.message = message
  }
}

/** Use the text of another error (or any thrown value) as the message. */
export function withErrorMessage(err: unknown): ErrorOption {
  return (draft) => {
    draft.message = errorText(err)
  }
}

/** Merge entries into the metadata; same keys are overwritten. */
export function withMetadata(metadata: Metadata): ErrorOption {
  return (draft) => {
    for (const [key, entry] of Object.entries(metadata)) {
      addMetadataValue(draft, entry.visibility, key, entry.value)
    }
  }
}

export function withMetadataValue(
  visibility: Visibility,
  key: string,
  value: string,
): ErrorOption {
  return (draft) => {
    addMetadataValue(draft, visibility, key, value)
  }
}

export function withVisibility(visibility: Visibility): ErrorOption {
  return (draft) => {
    draft.visibility = visibility
  }
}

export function withSubject(subject: string): ErrorOption {
  return (draft) => {
    draft.subject = subject
  }
}

export function withId(id: string): ErrorOption {
  return (draft) => {
    draft.id = id
  }
}

export function withTime(time: Date): ErrorOption {
  return (draft) => {
    draft.time = new Date(time.getTime())
  }
}

export function withSourceId(sourceId: string): ErrorOption {
  return (draft) => {
    draft.sourceId = sourceId
  }
}

/** Replace the help links. */
export function withHelp(help: Help): ErrorOption {
  return (draft) => {
    draft.help = { links: help.links.map((link) => Object.freeze({ ...link })) }
  }
}

/** Append one help link. */
export function withHelpLink(description: string, url: string): ErrorOption {
  return (draft) => {
    addHelpLink(draft, description, url)
  }
}

export function withDebugInfo(debugInfo: DebugInfo): ErrorOption {
  return (draft) => {
    draft.debugInfo = {
      stackFrames: debugInfo.stackFrames.map((frame) => Object.freeze({ ...frame })),
      detail: debugInfo.detail,
    }
  }
}

/** Set the debug detail, keeping any captured frames. */
export function withDebugDetail(detail: string): ErrorOption {
  return (draft) => {
    draft.debugInfo = { stackFrames: draft.debugInfo?.stackFrames ?? [], detail }
  }
}

/** Capture the caller's stack, up to 32 frames. */
export function withStackTrace(): ErrorOption {
  return withStackTraceDepth(DEFAULT_STACK_DEPTH)
}

/**
 * Capture up to `depth` frames of the caller's stack, keeping any debug
 * detail already set. A non-positive depth means 32.
 */
export function withStackTraceDepth(depth: number): ErrorOption {
  return (draft) => {
    const stackFrames = captureStackFrames(draft.boundary, depth).map((frame) =>
      Object.freeze(frame),
    )

    draft.debugInfo = { stackFrames, detail: draft.debugInfo?.detail ?? "" }
  }
}

export function withLocalizedMessage(locale: string, message: string): ErrorOption {
  return (draft) => {
    draft.localizedMessage = Object.freeze({ locale, message })
  }
}

/** Retry after `offset` milliseconds. Replaces any retry time. */
export function withRetryOffset(offset: Milliseconds): ErrorOption {
  return (draft) => {
    draft.retryInfo = { kind: "offset", offset }
  }
}

/** Retry at `time`. Replaces any retry offset. */
export function withRetryTime(time: Date): ErrorOption {
  return (draft) => {
    draft.retryInfo = { kind: "time", time: new Date(time.getTime()) }
  }
}

/** Append nested causes. These are not part of the `cause` chain. */
export function withCause(...causes: StructuredError[]): ErrorOption {
  return (draft) => {
    draft.causes.push(...causes)
  }
}

/**
 * Wrap another error; it becomes `cause` and the next link of the chain.
 * `null` and `undefined` leave the error unwrapped.
 */
export function withWrap(err: unknown): ErrorOption {
  return (draft) => {
    draft.wrapped = err ?? undefined
  }
}
