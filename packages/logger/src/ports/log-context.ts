/**
 * Fields the envfile operations attach to their log entries.
 */
export type LogContext = {
  /** Facade operation, e.g. "fromStr", "toFile". */
  operation: string
  /** File path for file-backed operations. */
  file: string
  prefix: string
  separator: string

  /** Env key or logical field path the entry is about. */
  key: string
  path: string

  entries: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
