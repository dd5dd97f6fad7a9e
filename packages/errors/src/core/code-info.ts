import { Code, type CodeInfo, type CodeName } from "../ports/code"
import { Visibility, type VisibilityName } from "../ports/visibility"

const CODE_INFO: Readonly<Record<Code, CodeInfo>> = {
  [Code.Cancelled]: { name: "CANCELLED", message: "the operation was cancelled", status: 499 },
  [Code.Unknown]: { name: "UNKNOWN", message: "unknown error", status: 500 },
  [Code.InvalidArgument]: {
    name: "INVALID_ARGUMENT",
    message: "invalid argument provided",
    status: 400,
  },
  [Code.DeadlineExceeded]: { name: "DEADLINE_EXCEEDED", message: "deadline exceeded", status: 504 },
  [Code.NotFound]: { name: "NOT_FOUND", message: "resource not found", status: 404 },
  [Code.AlreadyExists]: { name: "ALREADY_EXISTS", message: "resource already exists", status: 409 },
  [Code.PermissionDenied]: { name: "PERMISSION_DENIED", message: "permission denied", status: 403 },
  [Code.ResourceExhausted]: {
    name: "RESOURCE_EXHAUSTED",
    message: "resource exhausted",
    status: 429,
  },
  [Code.FailedPrecondition]: {
    name: "FAILED_PRECONDITION",
    message: "failed precondition",
    status: 400,
  },
  [Code.Aborted]: { name: "ABORTED", message: "operation aborted", status: 409 },
  [Code.OutOfRange]: { name: "OUT_OF_RANGE", message: "out of range", status: 400 },
  [Code.Unimplemented]: { name: "UNIMPLEMENTED", message: "not implemented", status: 501 },
  [Code.Internal]: { name: "INTERNAL", message: "internal error", status: 500 },
  [Code.Unavailable]: { name: "UNAVAILABLE", message: "service unavailable", status: 503 },
  [Code.DataLoss]: { name: "DATA_LOSS", message: "data loss or corruption", status: 500 },
  [Code.Unauthenticated]: { name: "UNAUTHENTICATED", message: "unauthenticated", status: 401 },
}

const CODES_BY_NAME: ReadonlyMap<string, Code> = new Map(
  Object.values(Code).map((code) => [CODE_INFO[code].name, code]),
)

const VISIBILITY_NAMES: Readonly<Record<Visibility, VisibilityName>> = {
  [Visibility.Internal]: "INTERNAL",
  [Visibility.Private]: "PRIVATE",
  [Visibility.Public]: "PUBLIC",
}

function isCode(value: number): value is Code {
  return Object.hasOwn(CODE_INFO, value)
}

function isVisibility(value: number): value is Visibility {
  return Object.hasOwn(VISIBILITY_NAMES, value)
}

/**
 * Name, default message and status for a code.
 * Unrecognized values resolve to `Code.Unknown`'s entry.
 */
export function codeInfo(code: number): CodeInfo {
  return isCode(code) ? CODE_INFO[code] : CODE_INFO[Code.Unknown]
}

export function codeName(code: number): CodeName {
  return codeInfo(code).name
}

export function codeMessage(code: number): string {
  return codeInfo(code).message
}

export function codeHttpStatus(code: number): number {
  return codeInfo(code).status
}

/** Reverse lookup of {@link codeName}. */
export function parseCode(name: string): Code | undefined {
  return CODES_BY_NAME.get(name)
}

export function visibilityName(visibility: number): VisibilityName | "UNKNOWN" {
  return isVisibility(visibility) ? VISIBILITY_NAMES[visibility] : "UNKNOWN"
}

/**
 * Whether a field tagged `visibility` may be shown to `audience`.
 *
 * @example
 * ```ts
 * isVisibleTo(Visibility.Public, Visibility.Private) // true
 * isVisibleTo(Visibility.Internal, Visibility.Public) // false
 * ```
 */
export function isVisibleTo(visibility: Visibility, audience: Visibility): boolean {
  return visibility >= audience
}
