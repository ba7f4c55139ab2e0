import type { ErrorHandler } from "../errors/create-error-handler"
import { registerHealthRoutes } from "../routes/health"
import type { Application, Middleware } from "../server/server"
import type { ResolvedServerOptions } from "../server/server-options"

interface BuildAppContext {
  app: Application
  isReady: () => boolean
  createErrorHandler: () => ErrorHandler
  options: ResolvedServerOptions
  defaultMiddleware: Middleware[]
}

/** Default middleware, then health routes, then application routes. */
export function buildApp(ctx: BuildAppContext): Application {
  const { app, options, isReady } = ctx

  for (const mw of ctx.defaultMiddleware) app.use("*", mw)

  registerHealthRoutes(app, options.readinessChecks, isReady)
  options.routes(app)

  app.onError(ctx.createErrorHandler())

  return app
}

export type BuildAppFn = typeof buildApp
