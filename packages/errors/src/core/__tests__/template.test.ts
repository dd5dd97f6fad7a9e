import { Code } from "../../ports/code"
import { Visibility } from "../../ports/visibility"
import { withCode, withHelpLink, withMessage, withStackTrace, withVisibility, withWrap } from "../options"
import { stackEntries } from "../stack-trace"
import {
  createErrorTemplate,
  templateWithCode,
  templateWithHelp,
  templateWithHelpLink,
  templateWithMessage,
  templateWithVisibility,
} from "../template"
import { createError } from "../utils/create-error"

describe("createErrorTemplate", () => {
  const ZoneMissing = createErrorTemplate(
    "garden.irrigation",
    "ZONE_MISSING",
    templateWithCode(Code.NotFound),
    templateWithMessage("zone not found"),
    templateWithVisibility(Visibility.Public),
    templateWithHelpLink("Zones", "https://garden.test/zones"),
  )

  it("exposes its identity", () => {
    expect(ZoneMissing.domain).toBe("garden.irrigation")
    expect(ZoneMissing.reason).toBe("ZONE_MISSING")
  })

  describe("newError", () => {
    it("stamps the template defaults", () => {
      const err = ZoneMissing.newError()

      expect(err.domain).toBe("garden.irrigation")
      expect(err.reason).toBe("ZONE_MISSING")
      expect(err.code).toBe(Code.NotFound)
      expect(err.message).toBe("zone not found")
      expect(err.visibility).toBe(Visibility.Public)
      expect(err.help?.links).toEqual([{ description: "Zones", url: "https://garden.test/zones" }])
    })

    it("lets instance options override scalar defaults", () => {
      const err = ZoneMissing.newError(
        withCode(Code.Internal),
        withMessage("zone 4 vanished"),
        withVisibility(Visibility.Private),
      )

      expect(err.code).toBe(Code.Internal)
      expect(err.message).toBe("zone 4 vanished")
      expect(err.visibility).toBe(Visibility.Private)
    })

    it("adds instance help links after the template's", () => {
      const err = ZoneMissing.newError(withHelpLink("Map", "https://garden.test/map"))

      expect(err.help?.links).toEqual([
        { description: "Zones", url: "https://garden.test/zones" },
        { description: "Map", url: "https://garden.test/map" },
      ])
    })

    it("does not share help links between instances", () => {
      const first = ZoneMissing.newError(withHelpLink("Map", "https://garden.test/map"))
      const second = ZoneMissing.newError()

      expect(first.help?.links).toHaveLength(2)
      expect(second.help?.links).toHaveLength(1)
    })

    it("captures the stack from the caller of newError", () => {
      const err = ZoneMissing.newError(withStackTrace())
      const entries = stackEntries(err.debugInfo ?? { stackFrames: [], detail: "" })

      expect(entries[0]).toContain("template.test.ts:")
    })
  })

  describe("defaults", () => {
    it("starts from UNKNOWN, INTERNAL and the code's message", () => {
      const Bare = createErrorTemplate("garden.irrigation", "BARE")
      const err = Bare.newError()

      expect(err.code).toBe(Code.Unknown)
      expect(err.visibility).toBe(Visibility.Internal)
      expect(err.message).toBe("unknown error")
      expect(err.help).toBeUndefined()
    })

    it("uses the code's message when the template message is empty", () => {
      const Quiet = createErrorTemplate(
        "garden.irrigation",
        "QUIET",
        templateWithCode(Code.Unavailable),
        templateWithMessage(""),
      )

      expect(Quiet.newError().message).toBe("service unavailable")
    })

    it("replaces help links with templateWithHelp", () => {
      const Helpful = createErrorTemplate(
        "garden.irrigation",
        "HELPFUL",
        templateWithHelpLink("Old", "https://garden.test/old"),
        templateWithHelp({ links: [{ description: "New", url: "https://garden.test/new" }] }),
      )

      expect(Helpful.newError().help?.links).toEqual([
        { description: "New", url: "https://garden.test/new" },
      ])
    })
  })

  describe("is", () => {
    it("recognises its own errors", () => {
      expect(ZoneMissing.is(ZoneMissing.newError())).toBe(true)
    })

    it("recognises errors with the same identity built elsewhere", () => {
      expect(ZoneMissing.is(createError("garden.irrigation", "ZONE_MISSING"))).toBe(true)
    })

    it("rejects other identities and non-structured values", () => {
      expect(ZoneMissing.is(createError("garden.irrigation", "ZONE_LOCKED"))).toBe(false)
      expect(ZoneMissing.is(new Error("zone not found"))).toBe(false)
      expect(ZoneMissing.is(undefined)).toBe(false)
    })

    it("does not walk the cause chain", () => {
      const outer = createError("garden.api", "REQUEST_FAILED", withWrap(ZoneMissing.newError()))

      expect(ZoneMissing.is(outer)).toBe(false)
    })
  })
})
