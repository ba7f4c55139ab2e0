import { type Clock, SystemClock } from "@bucket-index/clock"
import { createPinoLogger, type Logger } from "@bucket-index/logger"
import type { AppConfig } from "../config"

export type CoreServices = {
  logger: Logger
  clock: Clock
}

export function createCoreServices(config: AppConfig): CoreServices {
  const clock = new SystemClock()

  const logger = createPinoLogger(
    { service: config.app.serviceName, env: config.app.env },
    {
      level: config.logging.level,
      prettify: config.logging.prettify,
    },
  )

  return { clock, logger }
}
