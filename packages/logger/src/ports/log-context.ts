/**
 * Fields the folding packages bind or pass on their log entries.
 */
export type LogContext = {
  module: string
  folding: string
  operation: string

  /** Number of populated classes in the map at the time of the entry. */
  size: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
