export { NullLogger } from "./adapters/null/null-logger"
export { PinoLogger, type PinoLoggerOptions } from "./adapters/pino/pino-logger"
export { createPinoLogger } from "./create"
export type { LogContext, LogContextPatch, LogMeta } from "./ports/log-context"
export { type LogLevelName, logLevelNames } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
