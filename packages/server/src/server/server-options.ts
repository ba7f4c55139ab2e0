import type { Clock, Milliseconds } from "@bucket-index/clock"
import type { Logger } from "@bucket-index/logger"
import type { ErrorMappingsConfig } from "../errors/errors"
import type { LifecycleHook } from "../lifecycle/lifecycle-hook"
import type { SecurityHeadersConfig } from "../middleware/security-headers"
import type { Application } from "./server"

export interface ServerDependencies {
  logger: Logger
  clock: Clock
}

/** Named check run by the readiness endpoint. Resolving `false` marks the server unready. */
export interface ReadinessCheck {
  name: string
  fn: (signal: AbortSignal) => Promise<boolean>
}

export interface ServerOptions {
  port: number

  /** @default "0.0.0.0" */
  host?: string

  /** @default 10_000 */
  shutdownTimeoutMs?: Milliseconds

  /**
   * Proxies at the end of X-Forwarded-For to trust when resolving the client IP.
   * Unset means the socket's remote address is used.
   */
  trustedProxies?: number

  securityHeaders?: SecurityHeadersConfig

  /** Run in order by `/ready` once the server has started. */
  readinessChecks?: ReadinessCheck[]

  /** Maps error codes to status and message; anything unmapped gets the fallback. */
  errorMappings: ErrorMappingsConfig

  routes: (app: Application) => void

  startHooks?: LifecycleHook[]
  stopHooks?: LifecycleHook[]
}

export type ResolvedServerOptions = {
  port: number
  host: string
  shutdownTimeoutMs: Milliseconds
  trustedProxies: number | undefined
  securityHeaders: SecurityHeadersConfig
  readinessChecks: ReadinessCheck[]
  errorMappings: ErrorMappingsConfig
  routes: (app: Application) => void
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

const DEFAULT_HOST = "0.0.0.0"
const DEFAULT_SHUTDOWN_TIMEOUT_MS: Milliseconds = 10_000

export function resolveOptions(options: ServerOptions): ResolvedServerOptions {
  return {
    port: options.port,
    host: options.host ?? DEFAULT_HOST,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS,
    trustedProxies:
      options.trustedProxies === undefined
        ? undefined
        : Math.max(0, Math.floor(options.trustedProxies)),
    securityHeaders: options.securityHeaders ?? {},
    readinessChecks: options.readinessChecks ?? [],
    errorMappings: options.errorMappings,
    routes: options.routes,
    startHooks: options.startHooks ?? [],
    stopHooks: options.stopHooks ?? [],
  }
}
