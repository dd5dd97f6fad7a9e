import type { DebugInfo, StackFrame } from "../ports/error"

export const DEFAULT_STACK_DEPTH = 32

// "at fn (file:line:col)" or "at file:line:col"
const FRAME_PATTERN = /^\s*at (?:(.+?) \()?(.+?):(\d+):(\d+)\)?$/

export type StackBoundary = (...args: never[]) => unknown

/**
 * Capture up to `maxDepth` frames of the current stack, starting at the caller
 * of `boundary`.
 *
 * @remarks
 * `Error.stackTraceLimit` is raised only for the duration of this call.
 */
export function captureStackFrames(
  boundary: StackBoundary,
  maxDepth: number = DEFAULT_STACK_DEPTH,
): StackFrame[] {
  const depth = maxDepth > 0 ? Math.floor(maxDepth) : DEFAULT_STACK_DEPTH
  const holder: { stack?: string } = {}
  const previousLimit = Error.stackTraceLimit

  try {
    Error.stackTraceLimit = depth
    Error.captureStackTrace(holder, boundary)
  } finally {
    Error.stackTraceLimit = previousLimit
  }

  return parseStack(holder.stack ?? "").slice(0, depth)
}

export function parseStack(stack: string): StackFrame[] {
  const frames: StackFrame[] = []

  for (const line of stack.split("\n")) {
    const match = FRAME_PATTERN.exec(line)
    if (!match) continue

    const [, fn, file, lineNo, column] = match
    if (file === undefined || lineNo === undefined || column === undefined) continue

    frames.push({
      file,
      line: Number(lineNo),
      column: Number(column),
      function: fn ?? "<anonymous>",
    })
  }

  return frames
}

export function formatStackFrame(frame: StackFrame): string {
  return `${frame.file}:${frame.line} ${frame.function}`
}

/** Frames rendered one per line as `<file>:<line> <function>`. */
export function stackEntries(debugInfo: DebugInfo): string[] {
  return debugInfo.stackFrames.map(formatStackFrame)
}
