import type { Logger } from "@bucket-index/logger"
import { serve } from "@hono/node-server"
import type { Application } from "../server/server"
import type { ResolvedServerOptions } from "../server/server-options"
import type { Closeable } from "./shutdown"

export function listen(
  app: Application,
  config: ResolvedServerOptions,
  logger: Logger,
): Closeable {
  return serve(
    {
      fetch: app.fetch,
      port: config.port,
      hostname: config.host,
    },
    (info) => {
      logger.info(`Server listening on http://${config.host}:${info.port}`)
    },
  )
}

export type ListenFn = typeof listen
