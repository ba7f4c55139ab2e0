import type { Logger } from "@bucket-index/logger"
import type { Middleware } from "../server/server"

/**
 * Logs one line per completed request: 5xx at `error`, everything else at `info`.
 * Requests under `ignorePaths` are not logged.
 */
export function requestLoggingMiddleware(
  baseLogger: Logger,
  ignorePaths: readonly string[] = [],
): Middleware {
  return async (c, next) => {
    const path = c.req.path

    if (isIgnored(path, ignorePaths)) {
      await next()
      return
    }

    const start = performance.now()

    try {
      await next()
    } finally {
      const status = c.res.status
      const clientIp = c.get("clientIp")
      const userAgent = c.req.header("user-agent")

      const meta = {
        requestId: c.get("requestId") ?? "unknown",
        method: c.req.method,
        path,
        status,
        durationMs: Math.round(performance.now() - start),
        ...(clientIp !== undefined && { clientIp }),
        ...(userAgent !== undefined && { userAgent }),
      }

      const logger = c.get("logger") ?? baseLogger

      if (status >= 500) logger.error("Request completed", meta)
      else logger.info("Request completed", meta)
    }
  }
}

function isIgnored(path: string, ignorePaths: readonly string[]): boolean {
  return ignorePaths.some((ignored) => path === ignored || path.startsWith(`${ignored}/`))
}
