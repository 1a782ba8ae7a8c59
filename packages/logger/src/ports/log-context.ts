/**
 * Well-known fields a codec log line may carry.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  operation: "encode" | "decode"
  startMask: number
  lengthBytes: number
  steps: number
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
