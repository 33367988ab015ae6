/**
 * Structured fields that loggers in this project attach to records.
 */
export type LogContext = {
  service: string
  module: string

  /** Name of the environment being resolved, e.g. "dev". */
  environment: string

  /** Provenance name of a variable source, e.g. "env-file:.env". */
  source: string

  /** Path of a file that was read. */
  file: string

  /** Number of variables or environments involved. */
  count: number
  durationMs: number
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
