import { Code } from "../../../ports/code"
import { Visibility } from "../../../ports/visibility"
import { withMetadataValue } from "../../options"
import { StructuredError } from "../../structured-error"
import { createErrorTemplate, templateWithCode } from "../../template"
import { createError } from "../create-error"
import { isStructuredError } from "../is-structured-error"
import { toStructuredError } from "../to-structured-error"

const Unexpected = createErrorTemplate(
  "garden.runtime",
  "UNEXPECTED",
  templateWithCode(Code.Internal),
)

describe("toStructuredError", () => {
  it("passes StructuredError through unchanged", () => {
    const err = createError("garden.sensors", "SENSOR_OFFLINE")

    expect(toStructuredError(err, Unexpected)).toBe(err)
  })

  it("wraps an Error using its message", () => {
    const original = new RangeError("index 9 out of bounds")

    const err = toStructuredError(original, Unexpected)

    expect(Unexpected.is(err)).toBe(true)
    expect(err.code).toBe(Code.Internal)
    expect(err.message).toBe("index 9 out of bounds")
    expect(err.cause).toBe(original)
  })

  it("wraps non-Error values using their text", () => {
    const err = toStructuredError("disk on fire", Unexpected)

    expect(err.message).toBe("disk on fire")
    expect(err.cause).toBe("disk on fire")
  })

  it("applies extra options after the template", () => {
    const err = toStructuredError(
      new Error("boom"),
      Unexpected,
      withMetadataValue(Visibility.Internal, "job", "nightly-sync"),
    )

    expect(err.metadata).toEqual({ job: { value: "nightly-sync", visibility: Visibility.Internal } })
  })

  it("does not wrap null", () => {
    const err = toStructuredError(null, Unexpected)

    expect(err.message).toBe("null")
    expect(err.cause).toBeUndefined()
  })
})

describe("isStructuredError", () => {
  it("returns true for StructuredError", () => {
    expect(isStructuredError(createError("garden.sensors", "SENSOR_OFFLINE"))).toBe(true)
  })

  it("returns false for plain errors and look-alikes", () => {
    const lookalike = Object.assign(new Error("x"), { domain: "garden.sensors", reason: "SENSOR_OFFLINE" })

    expect(isStructuredError(new Error("x"))).toBe(false)
    expect(isStructuredError(lookalike)).toBe(false)
    expect(isStructuredError(null)).toBe(false)
  })

  it("narrows the type", () => {
    const value: unknown = createError("garden.sensors", "SENSOR_OFFLINE")

    if (isStructuredError(value)) {
      expect(value).toBeInstanceOf(StructuredError)
      expect(value.reason).toBe("SENSOR_OFFLINE")
    }
  })
})
