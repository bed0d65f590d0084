export type LogContext = {
  service: string
  module: string
  env: string

  requestId: string
  method: string
  path: string
  status: number

  /** Name of the operation whose result is being reported, e.g. `people.register`. */
  operation: string
  outcome: "success" | "failure"
  errorCodes: string[]
  errorKinds: string[]
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
