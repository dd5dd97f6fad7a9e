import { Code, createErrorTemplate, templateWithCode } from "@faultline/errors"
import type { LoggerHarness } from "./logger-harness"

const ZoneMissing = createErrorTemplate(
  "garden.irrigation",
  "ZONE_MISSING",
  templateWithCode(Code.NotFound),
)

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ requestId: "req-1" })
      const child = parent.child({ userId: "u-1" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({
        requestId: "req-1",
        userId: "u-1",
      })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ requestId: "req-1" })
      const child = parent.child({ requestId: "req-2" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload.requestId).toBe("req-2")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      const parent = logger.child({ requestId: "req-1" })
      const child = parent.child({ userId: "u-1" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).toMatchObject({ requestId: "req-1" })
      expect(logs[0]?.payload).not.toHaveProperty("userId")
      expect(logs[1]?.payload).toMatchObject({ requestId: "req-1", userId: "u-1" })

      clear()
    })

    it("per-call meta merges with context (meta overrides)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const scoped = logger.child({ requestId: "req-1" })
      scoped.info("hello", { requestId: "req-2" })

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload.requestId).toBe("req-2")
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      const levels = read().map((l) => l.level)

      expect(levels).toEqual(["warn", "error"])
    })

    it("err meta is serialized with the error's identity", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.error("failed", { err: ZoneMissing.newError() })

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload.err).toMatchObject({
        domain: "garden.irrigation",
        reason: "ZONE_MISSING",
        code: "NOT_FOUND",
        status: 404,
      })
    })
  })
}
