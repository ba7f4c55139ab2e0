import type { EventEmitter } from "node:events"
import type { Logger } from "@bucket-index/logger"
import type { StopResult } from "./shutdown"

export interface SignalHandlerContext {
  logger: Logger
  stop?: () => Promise<StopResult>
  /** @default 10_000 */
  fatalTimeoutMs?: number
  /** @default process.exit */
  exit?: (code: number) => void
  /** Where signal and fatal-error listeners are attached. @default process */
  events?: Pick<EventEmitter, "on" | "off">
}

export interface SignalHandler {
  unregister: () => void
}

type ShutdownState = { stopping: boolean }

async function runStop(ctx: SignalHandlerContext, reason: string): Promise<void> {
  if (!ctx.stop) {
    ctx.logger.warn("No stop handler registered", { reason })
    return
  }

  try {
    const result = await ctx.stop()

    if (!result.ok) {
      ctx.logger.error("Shutdown completed with issues", {
        reason,
        failedHooks: result.failures.map((f) => f.hook),
        timedOut: result.timedOut,
      })
    }
  } catch (err) {
    ctx.logger.error("Shutdown failed", { reason, err })
  }
}

async function stopThenExit(
  ctx: SignalHandlerContext,
  exit: (code: number) => void,
  timeoutMs: number,
  reason: string,
): Promise<void> {
  const timer = setTimeout(() => {
    ctx.logger.fatal("Forced exit after timeout", { timeoutMs })
    exit(1)
  }, timeoutMs)
  timer.unref()

  try {
    await runStop(ctx, reason)
  } finally {
    clearTimeout(timer)
  }

  exit(1)
}

/**
 * Registers process handlers: SIGINT/SIGTERM stop the server gracefully; an uncaught
 * exception or unhandled rejection stops it and exits with status 1.
 */
export function setupProcessHandlers(ctx: SignalHandlerContext): SignalHandler {
  const fatalTimeoutMs = ctx.fatalTimeoutMs ?? 10_000
  const exit = ctx.exit ?? ((code: number) => process.exit(code))
  const events: Pick<EventEmitter, "on" | "off"> = ctx.events ?? process
  const state: ShutdownState = { stopping: false }

  const onSignal = (signal: NodeJS.Signals) => {
    ctx.logger.info("Received signal", { signal })

    if (state.stopping) return
    state.stopping = true

    ctx.logger.warn("Shutdown triggered", { reason: signal })
    void runStop(ctx, signal)
  }

  const onFatal = (reason: string, err: unknown) => {
    if (state.stopping) {
      ctx.logger.fatal("Fatal error during shutdown", { reason, err })
      exit(1)
      return
    }
    state.stopping = true

    ctx.logger.fatal("Fatal error", { reason, err })
    void stopThenExit(ctx, exit, fatalTimeoutMs, reason)
  }

  const sigint = () => onSignal("SIGINT")
  const sigterm = () => onSignal("SIGTERM")
  const uncaught = (err: Error) => onFatal("uncaughtException", err)
  const rejection = (reason: unknown) => onFatal("unhandledRejection", reason)

  events.on("SIGINT", sigint)
  events.on("SIGTERM", sigterm)
  events.on("uncaughtException", uncaught)
  events.on("unhandledRejection", rejection)

  return {
    unregister: () => {
      events.off("SIGINT", sigint)
      events.off("SIGTERM", sigterm)
      events.off("uncaughtException", uncaught)
      events.off("unhandledRejection", rejection)
    },
  }
}

export type SetupProcessHandlersFn = typeof setupProcessHandlers
