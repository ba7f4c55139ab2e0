import type { Logger } from "@bucket-index/logger"
import type { HttpBindings } from "@hono/node-server"

export type ServerContextVariables = {
  clientIp: string
  remoteIp: string
  requestId: string
  logger: Logger
}

/** Node bindings are absent when the app is driven through `app.request()`. */
export type ServerEnv = {
  Bindings: Partial<HttpBindings>
}

declare module "hono" {
  // eslint-disable-next-line @typescript-eslint/no-empty-object-type
  interface ContextVariableMap extends ServerContextVariables {}
}
