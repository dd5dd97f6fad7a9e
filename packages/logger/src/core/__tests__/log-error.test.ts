import {
  Code,
  createError,
  createErrorTemplate,
  templateWithCode,
  templateWithMessage,
  withCode,
} from "@faultline/errors"
import { NullLogger } from "../../adapters/null/null-logger"
import { logError } from "../log-error"

function makeSpyLogger() {
  const logger = new NullLogger()
  const error = vi.spyOn(logger, "error")
  const warn = vi.spyOn(logger, "warn")

  return { logger, error, warn }
}

const PlotTaken = createErrorTemplate(
  "garden.plots",
  "PLOT_TAKEN",
  templateWithCode(Code.AlreadyExists),
  templateWithMessage("plot already assigned"),
)

describe("logError", () => {
  it.each([Code.Unknown, Code.Internal, Code.DataLoss, Code.Unimplemented])(
    "logs code %i at error",
    (code) => {
      const { logger, error, warn } = makeSpyLogger()

      logError(logger, createError("garden.plots", "BROKEN", withCode(code)))

      expect(error).toHaveBeenCalledTimes(1)
      expect(warn).not.toHaveBeenCalled()
    },
  )

  it.each([Code.NotFound, Code.InvalidArgument, Code.Unavailable, Code.Unauthenticated])(
    "logs code %i at warn",
    (code) => {
      const { logger, error, warn } = makeSpyLogger()

      logError(logger, createError("garden.plots", "REJECTED", withCode(code)))

      expect(warn).toHaveBeenCalledTimes(1)
      expect(error).not.toHaveBeenCalled()
    },
  )

  it("passes identity fields and the error as meta", () => {
    const { logger, warn } = makeSpyLogger()
    const err = PlotTaken.newError()

    logError(logger, err)

    expect(warn).toHaveBeenCalledWith("plot already assigned", {
      err,
      domain: "garden.plots",
      reason: "PLOT_TAKEN",
      code: "ALREADY_EXISTS",
    })
  })

  it("uses an explicit message when given", () => {
    const { logger, warn } = makeSpyLogger()

    logError(logger, PlotTaken.newError(), "could not assign plot 7")

    expect(warn.mock.calls[0]?.[0]).toBe("could not assign plot 7")
  })

  it("logs non-structured values at error with their text", () => {
    const { logger, error } = makeSpyLogger()
    const err = new TypeError("undefined is not a function")

    logError(logger, err)
    logError(logger, "bare string")

    expect(error).toHaveBeenNthCalledWith(1, "undefined is not a function", { err })
    expect(error).toHaveBeenNthCalledWith(2, "bare string", { err: "bare string" })
  })
})
