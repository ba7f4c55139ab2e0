import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Minimum level to emit. */
  level: LogLevelName

  /**
   * Human-readable output for local development.
   * Leave off in production, where JSON lines are ingested.
   */
  prettify?: boolean
}
