/**
 * Fields a codec session binds to its logger.
 */
export type LogContext = {
  /** `write` while encoding state, `read` while decoding it */
  direction: "write" | "read"
  /** Name of the state entry being encoded or decoded */
  entry: string
  /** Codec that emitted the log line */
  codec: string
  /** Package that owns the logger */
  module: string
  /** Managed service a line concerns */
  service: string
}

/**
 * Measurements reported when a session finishes.
 */
export type LogOutcome = {
  bytes: number
  entries: number
  identities: number
  problems: number
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogOutcome> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
