import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*: which levels are emitted and how entries
 * are rendered. Adapters must honor them.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit. Entries below it are dropped.
   */
  level: LogLevelName

  /**
   * Pretty-print for humans instead of writing JSON lines.
   *
   * @remarks
   * Intended for local development. Keep it off where logs are ingested.
   */
  prettify?: boolean

  /**
   * Include debug detail and stack entries of StructuredErrors under `err`.
   * Default: false
   */
  includeErrorDebug?: boolean
}
