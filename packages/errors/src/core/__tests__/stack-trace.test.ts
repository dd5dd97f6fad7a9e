import type { StackFrame } from "../../ports/error"
import { withDebugDetail, withStackTrace, withStackTraceDepth } from "../options"
import { captureStackFrames, formatStackFrame, parseStack, stackEntries } from "../stack-trace"
import { createError } from "../utils/create-error"

describe("parseStack", () => {
  it("parses named and anonymous frames", () => {
    const stack = [
      "Error: boom",
      "    at loadZone (/srv/garden/zone.ts:14:9)",
      "    at /srv/garden/main.ts:3:1",
      "    at async Promise.all (index 0)",
    ].join("\n")

    expect(parseStack(stack)).toEqual([
      { file: "/srv/garden/zone.ts", line: 14, column: 9, function: "loadZone" },
      { file: "/srv/garden/main.ts", line: 3, column: 1, function: "<anonymous>" },
    ])
  })

  it("returns nothing for an empty stack", () => {
    expect(parseStack("")).toEqual([])
  })
})

describe("formatStackFrame", () => {
  it("renders file, line and function", () => {
    expect(formatStackFrame({ file: "zone.ts", line: 14, column: 9, function: "loadZone" })).toBe(
      "zone.ts:14 loadZone",
    )
  })

  it("stackEntries renders every frame", () => {
    expect(
      stackEntries({
        stackFrames: [
          { file: "a.ts", line: 1, column: 1, function: "a" },
          { file: "b.ts", line: 2, column: 1, function: "b" },
        ],
        detail: "",
      }),
    ).toEqual(["a.ts:1 a", "b.ts:2 b"])
  })
})

describe("captureStackFrames", () => {
  function boundary(depth?: number): StackFrame[] {
    return captureStackFrames(boundary, depth)
  }

  it("starts at the caller of the boundary", () => {
    const frames = boundary()

    expect(frames.length).toBeGreaterThan(0)
    expect(frames[0]?.file).toContain("stack-trace.test.ts")
  })

  it("respects the depth limit", () => {
    expect(boundary(2).length).toBeLessThanOrEqual(2)
    expect(boundary(1)).toHaveLength(1)
  })

  it("falls back to the default depth for non-positive values", () => {
    expect(boundary(0).length).toBeGreaterThan(0)
    expect(boundary(-5).length).toBeGreaterThan(0)
  })

  it("restores Error.stackTraceLimit", () => {
    const before = Error.stackTraceLimit

    boundary(3)

    expect(Error.stackTraceLimit).toBe(before)
  })
})

describe("stack options", () => {
  it("captures frames starting in the calling file", () => {
    const err = createError("garden.irrigation", "VALVE_STUCK", withStackTrace())
    const entries = stackEntries(err.debugInfo ?? { stackFrames: [], detail: "" })

    expect(entries.length).toBeGreaterThan(0)
    expect(entries[0]).toContain("stack-trace.test.ts:")
  })

  it("limits frames to the requested depth", () => {
    const err = createError("garden.irrigation", "VALVE_STUCK", withStackTraceDepth(1))

    expect(err.debugInfo?.stackFrames).toHaveLength(1)
  })

  it("keeps an earlier debug detail", () => {
    const err = createError(
      "garden.irrigation",
      "VALVE_STUCK",
      withDebugDetail("pressure low"),
      withStackTraceDepth(-1),
    )

    expect(err.debugInfo?.detail).toBe("pressure low")
    expect(err.debugInfo?.stackFrames.length).toBeGreaterThan(0)
  })
})
