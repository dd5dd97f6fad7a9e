export type LogContext = {
  requestId: string
  traceId: string

  service: string
  module: string
  env: string
}

/** Fields describing a failure, set by `logError`. */
export type LogEvent = {
  err: unknown
  domain: string
  reason: string
  code: string
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
