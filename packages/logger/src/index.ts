export { NullLogger, createNullLogger } from "./adapters/null/null-logger"
export {
  createPinoLogger,
  PinoLogger,
  type PinoLoggerDeps,
} from "./adapters/pino/pino-logger"
export { createErrSerializer } from "./adapters/pino/serializers"
export { logError } from "./core/log-error"
export {
  createConfiguredLogger,
  LoggerConfigInvalid,
  type LoggerEnv,
  LoggerEnvSchema,
  loadLoggerOptions,
} from "./core/logger-config"
export type { LogContext, LogContextPatch, LogEvent, LogMeta } from "./ports/log-context"
export {
  type LogLevel,
  type LogLevelName,
  LogLevels,
  logLevelName,
  logLevelNames,
} from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
