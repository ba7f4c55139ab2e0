import type { Milliseconds } from "@bucket-index/clock"
import { type Handler, Hono, type Context as HonoContext, type MiddlewareHandler } from "hono"
import {
  type CreateErrorHandlerFn,
  createErrorHandler,
} from "../errors/create-error-handler"
import { type BuildAppFn, buildApp } from "../lifecycle/build-app"
import {
  type CreateStopperFn,
  createStopper,
  type ServerHandle,
} from "../lifecycle/create-stopper"
import { type ListenFn, listen } from "../lifecycle/listen"
import { type ShutdownFn, shutdown, type StopResult } from "../lifecycle/shutdown"
import {
  type SetupProcessHandlersFn,
  type SignalHandler,
  setupProcessHandlers,
} from "../lifecycle/signals"
import { type StartupFn, startup } from "../lifecycle/startup"
import { StartupError } from "../lifecycle/startup-error"
import {
  type CreateDefaultMiddlewareFn,
  createDefaultMiddleware,
} from "../middleware/create-default-middleware"
import type { ServerEnv } from "../types/context"
import {
  type ResolvedServerOptions,
  resolveOptions,
  type ServerDependencies,
  type ServerOptions,
} from "./server-options"

export type Application = Hono<ServerEnv>
export type Context = HonoContext<ServerEnv>
export type Middleware = MiddlewareHandler<ServerEnv>
export type RequestHandler = Handler<ServerEnv>
export type ServerState = "idle" | "starting" | "started"

export interface ServerCollaborators {
  onStartup: StartupFn
  onShutdown: ShutdownFn
  listen: ListenFn
  buildApp: BuildAppFn
  createStopper: CreateStopperFn
  setupProcessHandlers: SetupProcessHandlersFn
  createDefaultMiddleware: CreateDefaultMiddlewareFn
  createErrorHandler: CreateErrorHandlerFn
}

export const defaultCollaborators: ServerCollaborators = {
  onStartup: startup,
  onShutdown: shutdown,
  listen,
  buildApp,
  createStopper,
  setupProcessHandlers,
  createDefaultMiddleware,
  createErrorHandler,
}

/** Longest timer Node accepts; start hooks are otherwise unbounded. */
const STARTUP_DEADLINE_MS: Milliseconds = 2_147_483_647

export function createApp(): Application {
  return new Hono<ServerEnv>()
}

export class Server {
  readonly app: Application

  private state: ServerState = "idle"
  private built = false
  private ready = false
  private runningServer?: ServerHandle
  private signalHandler?: SignalHandler

  constructor(
    private readonly deps: ServerDependencies,
    private readonly options: ResolvedServerOptions,
    private readonly collabs: ServerCollaborators = defaultCollaborators,
  ) {
    this.app = createApp()
  }

  setupProcessHandlers(): this {
    if (this.signalHandler) return this

    this.signalHandler = this.collabs.setupProcessHandlers({
      logger: this.deps.logger,
      stop: () => this.runningServer?.stop() ?? this.noopStop(),
    })

    return this
  }

  /**
   * Registers middleware, routes and the error handler without listening.
   * Lets tests drive the app through `app.request()`.
   */
  build(): this {
    if (this.built) return this

    this.collabs.buildApp({
      app: this.app,
      options: this.options,
      isReady: () => this.ready,
      createErrorHandler: () =>
        this.collabs.createErrorHandler(this.options.errorMappings, this.deps.logger),
      defaultMiddleware: this.collabs.createDefaultMiddleware(
        this.options,
        this.deps.logger,
      ),
    })

    this.built = true

    return this
  }

  /**
   * Runs start hooks, then listens.
   *
   * @throws {StartupError} when a start hook fails or the startup deadline passes
   */
  async start(): Promise<ServerHandle> {
    if (this.state !== "idle") {
      throw new Error("Server already started")
    }

    this.state = "starting"

    try {
      const result = await this.collabs.onStartup({
        clock: this.deps.clock,
        logger: this.deps.logger,
        deadlineMs: this.deps.clock.nowMs() + STARTUP_DEADLINE_MS,
        startHooks: this.options.startHooks,
      })

      if (!result.ok) throw StartupError.fromResult(result)

      this.build()

      const server = this.collabs.listen(this.app, this.options, this.deps.logger)

      const handle = this.collabs.createStopper({
        deps: this.deps,
        server,
        options: this.options,
        stopHooks: this.options.stopHooks,
        setReady: (v) => {
          this.ready = v
        },
        shutdown: this.collabs.onShutdown,
        onStop: () => this.signalHandler?.unregister(),
      })

      this.runningServer = handle
      this.ready = true
      this.state = "started"

      return handle
    } catch (err) {
      this.state = "idle"
      this.ready = false

      throw err
    }
  }

  getState(): ServerState {
    return this.state
  }

  isBuilt(): boolean {
    return this.built
  }

  isReady(): boolean {
    return this.ready
  }

  private noopStop(): Promise<StopResult> {
    this.deps.logger.warn("Stop called but server not running")

    return Promise.resolve({ ok: true, failures: [], timedOut: false })
  }
}

export function createServer(deps: ServerDependencies, options: ServerOptions): Server {
  return new Server(deps, resolveOptions(options))
}
