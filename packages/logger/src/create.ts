import { PinoLogger, type PinoLoggerOptions } from "./adapters/pino/pino-logger"
import type { LogContextPatch } from "./ports/log-context"
import type { Logger } from "./ports/logger"

/** Root application logger; `bindings` (service, env) appear on every entry. */
export function createPinoLogger(
  bindings: LogContextPatch,
  options: PinoLoggerOptions,
): Logger {
  return new PinoLogger(options, bindings)
}
