/** Well-known fields bound to a logger via `child()` or passed per call. */
export type LogContext = {
  requestId: string
  service: string
  env: string
  module: string

  method: string
  path: string
  status: number
  durationMs: number

  bucket: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta = Partial<LogContext> & Partial<LogEvent> & Record<string, unknown>

/** Overlay applied by `child()`; later keys win on conflict. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
