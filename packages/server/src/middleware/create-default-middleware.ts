import type { Logger } from "@bucket-index/logger"
import { LIVENESS_PATH, READINESS_PATH } from "../routes/health"
import type { Middleware } from "../server/server"
import type { ResolvedServerOptions } from "../server/server-options"
import { clientIpMiddleware } from "./client-ip"
import { requestIdMiddleware } from "./request-id"
import { requestLoggerMiddleware } from "./request-logger"
import { requestLoggingMiddleware } from "./request-logging"
import { securityHeadersMiddleware } from "./security-headers"

/**
 * Security headers run outermost so error responses get them too. The request ID has to
 * exist before the per-request logger binds it.
 */
export function createDefaultMiddleware(
  options: ResolvedServerOptions,
  logger: Logger,
): Middleware[] {
  return [
    securityHeadersMiddleware(options.securityHeaders),
    requestIdMiddleware(),
    clientIpMiddleware(options.trustedProxies),
    requestLoggerMiddleware(logger),
    requestLoggingMiddleware(logger, [LIVENESS_PATH, READINESS_PATH]),
  ]
}

export type CreateDefaultMiddlewareFn = typeof createDefaultMiddleware
