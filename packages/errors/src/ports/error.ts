import type { CodeName } from "./code"
import type { Visibility, VisibilityName } from "./visibility"

export type Milliseconds = number

export type MetadataValue = Readonly<{
  value: string
  visibility: Visibility
}>

/** Keyed metadata; rendering order is by key, never by insertion. */
export type Metadata = Readonly<Record<string, MetadataValue>>

export type HelpLink = Readonly<{
  description: string
  url: string
}>

export type Help = Readonly<{
  links: readonly HelpLink[]
}>

export type StackFrame = Readonly<{
  file: string
  line: number
  column: number
  function: string
}>

/**
 * Technical details for internal debugging.
 * Never carries a visibility tag: it is not meant to leave the process.
 */
export type DebugInfo = Readonly<{
  stackFrames: readonly StackFrame[]
  detail: string
}>

export type LocalizedMessage = Readonly<{
  /** BCP 47 tag, e.g. "es-ES" */
  locale: string
  message: string
}>

/**
 * When a client may retry.
 *
 * @remarks
 * Either a relative offset or an absolute time, never both.
 */
export type RetryInfo =
  | Readonly<{ kind: "offset"; offset: Milliseconds }>
  | Readonly<{ kind: "time"; time: Date }>

/**
 * Anything that can take part in `errorIs` matching.
 *
 * Any error type may implement `is` to declare equivalence with a target;
 * the unwrap link is the standard `cause` property.
 */
export interface ErrorMatcher {
  is(target: unknown): boolean
}

/**
 * Serialized error shape for logging.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedStructuredError = Readonly<{
  name: string
  specVersion: number
  code: CodeName
  status: number
  message: string
  domain: string
  reason: string
  visibility: VisibilityName | "UNKNOWN"
  metadata: Record<string, { value: string; visibility: VisibilityName | "UNKNOWN" }>
  causes: SerializedStructuredError[]
  subject?: string
  id?: string
  time?: string
  sourceId?: string
  help?: { description: string; url: string }[]
  localizedMessage?: { locale: string; message: string }
  retryInfo?: { retryOffset: string } | { retryTime: string }
  wrapped?: SerializedStructuredError | { name: string; message: string }
  debugInfo?: { detail: string; stack: string[] }
}>
