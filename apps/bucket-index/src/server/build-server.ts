import {
  type Application,
  createServer,
  DEFAULT_CONTENT_SECURITY_POLICY,
  type LifecycleHook,
  type Server,
} from "@bucket-index/server"
import type { AppContext } from "../app/create-context"

export type BuiltServer = {
  app: Application
  server: Server
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

export function buildServer(ctx: AppContext): BuiltServer {
  const { core, domains } = ctx.services
  const startHooks = ctx.createStartHooks(ctx.services)
  const stopHooks = ctx.createStopHooks(ctx.services)

  const server = createServer(
    {
      clock: core.clock,
      logger: core.logger,
    },
    {
      host: ctx.config.server.host,
      port: ctx.config.server.port,
      shutdownTimeoutMs: ctx.config.server.shutdownTimeoutMs,

      ...(ctx.config.server.trustedProxies !== undefined && {
        trustedProxies: ctx.config.server.trustedProxies,
      }),

      errorMappings: {
        mappings: {
          listing_failed: { status: 500, message: "Internal Server Error" },
          listing_not_ready: { status: 503, message: "Listing not available yet" },
          validation_error: { status: 400, message: "Invalid request" },
        },
      },

      // The listing page carries a single inline <style> block.
      securityHeaders: {
        contentSecurityPolicy: [...DEFAULT_CONTENT_SECURITY_POLICY, "style-src 'unsafe-inline'"],
      },

      readinessChecks: [{ name: "listing", fn: async () => domains.listing.cache.isHealthy() }],

      routes: (app: Application): void => {
        ctx.registerRoutes(app, domains)
      },

      startHooks,
      stopHooks,
    },
  )

  return {
    app: server.app,
    server,
    startHooks,
    stopHooks,
  }
}
