import type { Code } from "../ports/code"
import type {
  DebugInfo,
  ErrorMatcher,
  Help,
  LocalizedMessage,
  Metadata,
  RetryInfo,
  SerializedStructuredError,
} from "../ports/error"
import type { Visibility } from "../ports/visibility"
import type { ChangeOption } from "./change-options"
import { codeMessage } from "./code-info"
import { copyRetryInfo, copyState, type ErrorState, SPEC_VERSION } from "./draft"
import { formatError } from "./format"
import { serializeError } from "./serialize"
import { errorIs } from "./utils/error-is"

function freezeState(state: ErrorState): ErrorState {
  const frozen = copyState(state)

  Object.freeze(frozen.metadata)
  Object.freeze(frozen.causes)

  if (frozen.help) {
    Object.freeze(frozen.help.links)
    Object.freeze(frozen.help)
  }

  if (frozen.debugInfo) {
    Object.freeze(frozen.debugInfo.stackFrames)
    Object.freeze(frozen.debugInfo)
  }

  return Object.freeze(frozen)
}

/**
 * An immutable error value identified by its `domain` and `reason`.
 *
 * Build one with `createError` or an `ErrorTemplate`; derive a modified copy
 * with `withChanges`. The wrapped error, if any, is the standard `cause`.
 *
 * @example
 * ```ts
 * throw createError("billing.invoices", "INVOICE_NOT_FOUND",
 *   withCode(Code.NotFound),
 *   withMetadataValue(Visibility.Public, "invoiceId", invoiceId),
 * )
 * ```
 */
export class StructuredError extends Error implements ErrorMatcher {
  private readonly state: ErrorState

  /** @internal Use `createError` or `ErrorTemplate#newError`. */
  constructor(state: ErrorState) {
    const message = state.message === "" ? codeMessage(state.code) : state.message

    super(message, state.wrapped === undefined ? undefined : { cause: state.wrapped })

    this.name = "StructuredError"
    this.state = freezeState(state)

    Object.defineProperty(this, "message", { value: message, writable: false, configurable: false })
    if (state.wrapped !== undefined) {
      Object.defineProperty(this, "cause", {
        value: state.wrapped,
        writable: false,
        configurable: false,
      })
    }
  }

  get specVersion(): number {
    return SPEC_VERSION
  }

  get code(): Code {
    return this.state.code
  }

  get domain(): string {
    return this.state.domain
  }

  get reason(): string {
    return this.state.reason
  }

  get metadata(): Metadata {
    return this.state.metadata
  }

  get causes(): readonly StructuredError[] {
    return this.state.causes
  }

  get visibility(): Visibility {
    return this.state.visibility
  }

  get subject(): string {
    return this.state.subject
  }

  get id(): string {
    return this.state.id
  }

  /** A fresh copy on every read. */
  get time(): Date | undefined {
    return this.state.time && new Date(this.state.time.getTime())
  }

  get help(): Help | undefined {
    return this.state.help
  }

  get debugInfo(): DebugInfo | undefined {
    return this.state.debugInfo
  }

  get localizedMessage(): LocalizedMessage | undefined {
    return this.state.localizedMessage
  }

  get retryInfo(): RetryInfo | undefined {
    return this.state.retryInfo && copyRetryInfo(this.state.retryInfo)
  }

  get sourceId(): string {
    return this.state.sourceId
  }

  /**
   * Same domain and reason as `target`. Any other target is looked for in
   * the wrapped chain.
   */
  is(target: unknown): boolean {
    if (target instanceof StructuredError) {
      return target.domain === this.domain && target.reason === this.reason
    }

    return errorIs(this.cause, target)
  }

  unwrap(): unknown {
    return this.cause
  }

  /** A copy of this error with the given changes applied. */
  withChanges(...options: ChangeOption[]): StructuredError {
    const draft = copyState(this.state)

    for (const option of options) {
      option(draft)
    }

    return new StructuredError(draft)
  }

  toString(): string {
    return formatError(this)
  }

  toJSON(): SerializedStructuredError {
    return serializeError(this)
  }
}
