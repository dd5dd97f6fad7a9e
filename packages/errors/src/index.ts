export {
  type ChangeOption,
  changeHelpLink,
  changeId,
  changeLocalizedMessage,
  changeMetadata,
  changeMetadataValue,
  changeRetryOffset,
  changeRetryTime,
  changeSourceId,
  changeTime,
} from "./core/change-options"
export {
  codeHttpStatus,
  codeInfo,
  codeMessage,
  codeName,
  isVisibleTo,
  parseCode,
  visibilityName,
} from "./core/code-info"
export { SPEC_VERSION } from "./core/draft"
export { formatDuration, formatError, formatRfc3339 } from "./core/format"
export {
  type ErrorOption,
  withCause,
  withCode,
  withDebugDetail,
  withDebugInfo,
  withErrorMessage,
  withHelp,
  withHelpLink,
  withId,
  withLocalizedMessage,
  withMessage,
  withMetadata,
  withMetadataValue,
  withRetryOffset,
  withRetryTime,
  withSourceId,
  withStackTrace,
  withStackTraceDepth,
  withSubject,
  withTime,
  withVisibility,
  withWrap,
} from "./core/options"
export { type SerializeOptions, serializeError } from "./core/serialize"
export { DEFAULT_STACK_DEPTH, formatStackFrame, stackEntries } from "./core/stack-trace"
export { StructuredError } from "./core/structured-error"
export {
  createErrorTemplate,
  ErrorTemplate,
  type TemplateOption,
  templateWithCode,
  templateWithHelp,
  templateWithHelpLink,
  templateWithMessage,
  templateWithVisibility,
} from "./core/template"
export { createError } from "./core/utils/create-error"
export { type ErrorAsResult, type ErrorIdentity, errorAs } from "./core/utils/error-as"
export { errorChain } from "./core/utils/error-chain"
export { errorIs } from "./core/utils/error-is"
export { errorText } from "./core/utils/error-text"
export { isStructuredError } from "./core/utils/is-structured-error"
export { toStructuredError } from "./core/utils/to-structured-error"
export { Code, type CodeInfo, type CodeName } from "./ports/code"
export type {
  DebugInfo,
  ErrorMatcher,
  Help,
  HelpLink,
  LocalizedMessage,
  Metadata,
  MetadataValue,
  Milliseconds,
  RetryInfo,
  SerializedStructuredError,
  StackFrame,
} from "./ports/error"
export { Visibility, type VisibilityName } from "./ports/visibility"
