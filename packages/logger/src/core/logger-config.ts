import {
  Code,
  createErrorTemplate,
  templateWithCode,
  templateWithMessage,
  Visibility,
  withMessage,
  withMetadataValue,
} from "@faultline/errors"
import { z } from "zod"
import { createPinoLogger, type PinoLoggerDeps } from "../adapters/pino/pino-logger"
import type { LogContext, LogContextPatch } from "../ports/log-context"
import { logLevelNames } from "../ports/log-level"
import type { Logger } from "../ports/logger"
import type { LoggerOptions } from "../ports/logger-options"

export type LoggerEnv = Readonly<Record<string, string | undefined>>

export const LoggerEnvSchema = z.object({
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

/** Environment values do not satisfy `LoggerEnvSchema`. */
export const LoggerConfigInvalid = createErrorTemplate(
  "faultline.logger",
  "CONFIG_INVALID",
  templateWithCode(Code.InvalidArgument),
  templateWithMessage("logger configuration is invalid"),
)

/**
 * Read logger options from environment variables.
 *
 * - `LOG_LEVEL`: one of trace..fatal, default "info"
 * - `LOG_PRETTY`: boolean string ("true", "1", "yes", ...), default false
 *
 * Other variables are ignored.
 *
 * @throws StructuredError `faultline.logger`/`CONFIG_INVALID` for invalid
 * values, listing the offending variables in `keys` metadata.
 */
export function loadLoggerOptions(env: LoggerEnv = process.env): LoggerOptions {
  const result = LoggerEnvSchema.safeParse(env)

  if (!result.success) {
    const keys = new Set(result.error.issues.map((issue) => issue.path.map(String).join(".")))

    throw LoggerConfigInvalid.newError(
      withMessage(`logger configuration is invalid:\n${z.prettifyError(result.error)}`),
      withMetadataValue(Visibility.Private, "keys", [...keys].join(",")),
    )
  }

  return {
    level: result.data.LOG_LEVEL,
    prettify: result.data.LOG_PRETTY,
  }
}

/** A pino-backed logger configured from `env` (default: `process.env`). */
export function createConfiguredLogger<TContext extends LogContext = LogContext>(
  deps?: PinoLoggerDeps,
  env?: LoggerEnv,
  context?: LogContextPatch,
): Logger<TContext> {
  return createPinoLogger<TContext>(deps, loadLoggerOptions(env), context)
}
