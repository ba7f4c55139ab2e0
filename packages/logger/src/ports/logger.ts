import type { LogContextPatch, LogMeta } from "./log-context"

export interface Logger {
  trace(message: string, meta?: LogMeta): void
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void
  fatal(message: string, meta?: LogMeta): void

  /**
   * Creates a logger that includes `context` in every entry, on top of the parent's
   * bindings. The parent is not modified.
   */
  child(context: LogContextPatch): Logger
}
