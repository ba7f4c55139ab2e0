import type { Logger } from "@bucket-index/logger"
import type { Middleware } from "../server/server"
import { isNonEmptyString } from "./utils/is-non-empty-string"

/** Attaches a child logger bound to the request ID as `logger` on the context. */
export function requestLoggerMiddleware(baseLogger: Logger): Middleware {
  return async (c, next) => {
    const requestId = c.get("requestId")

    c.set("logger", baseLogger.child(isNonEmptyString(requestId) ? { requestId } : {}))

    await next()
  }
}
