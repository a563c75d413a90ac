/**
 * Well-known fields carried by configuration logs.
 */
export type LogContext = {
  service: string
  module: string

  /** Name of the configurator a log line is about. */
  configurator: string

  /** Canonical key a log line is about. */
  key: string

  /** Source (env, dotenv:.env, args) a value came from. */
  source: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by child().
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
