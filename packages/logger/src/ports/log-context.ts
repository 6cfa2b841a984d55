/**
 * Well-known fields bound to storage log lines.
 */
export type LogContext = {
  service: string
  module: string

  /** Backend kind, e.g. "redis". */
  backend: string
  /** Storage URL with credentials redacted. */
  endpoint: string

  operation: string
  key: string
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
