import pino, { type DestinationStream, type Logger as PinoBase } from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerOptions = Partial<LoggerOptions> & {
  /** Write to this stream instead of stdout. Ignored when `prettify` is on. */
  destination?: DestinationStream
}

export class PinoLogger implements Logger {
  protected readonly logger: PinoBase

  constructor(
    opts: PinoLoggerOptions = {},
    bindings: LogContextPatch = {},
    base?: PinoBase,
  ) {
    this.logger = (base ?? createBase(opts)).child(bindings)
  }

  trace(message: string, meta?: LogMeta): void {
    this.logger.trace(meta ?? {}, message)
  }

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(meta ?? {}, message)
  }

  info(message: string, meta?: LogMeta): void {
    this.logger.info(meta ?? {}, message)
  }

  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(meta ?? {}, message)
  }

  error(message: string, meta?: LogMeta): void {
    this.logger.error(meta ?? {}, message)
  }

  fatal(message: string, meta?: LogMeta): void {
    this.logger.fatal(meta ?? {}, message)
  }

  child(context: LogContextPatch): Logger {
    return new PinoLogger({}, context, this.logger)
  }
}

function createBase(opts: PinoLoggerOptions): PinoBase {
  const options: pino.LoggerOptions = {
    level: opts.level ?? "info",
    base: undefined,
    serializers: { err: errWithCause },
  }

  if (opts.prettify) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "hostname,pid",
        },
      },
    })
  }

  return opts.destination ? pino(options, opts.destination) : pino(options)
}
