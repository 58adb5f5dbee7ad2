export type LogContext = {
  requestId: string
  method: string
  path: string
  status: number
  durationMs: number
  service: string
  module: string
  env: string
  jobId: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
