import type { Clock, UnixMs } from "@bucket-index/clock"
import type { Logger } from "@bucket-index/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export interface Closeable {
  close: (callback?: (err?: Error | null) => void) => void
}

export type ShutdownContext = {
  server: Closeable
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
  stopHooks: LifecycleHook[]
}

export type StopResult = {
  /** No hook failed and the deadline held. */
  ok: boolean

  failures: HookFailure[]

  /** The deadline passed before every hook ran; open sockets are not force-closed. */
  timedOut: boolean
}

/**
 * Stops accepting connections, then runs every stop hook even if some fail.
 */
export async function shutdown(ctx: ShutdownContext): Promise<StopResult> {
  ctx.logger.warn("Shutting down gracefully...")

  const { failures, timedOut } = await runHooks(
    { phase: "shutdown", clock: ctx.clock, logger: ctx.logger, deadlineMs: ctx.deadlineMs },
    [closeServerHook(ctx.server), ...ctx.stopHooks],
    { failFast: false },
  )

  ctx.logger.info("Shutdown complete", { failureCount: failures.length, timedOut })

  return { ok: failures.length === 0 && !timedOut, failures, timedOut }
}

export type ShutdownFn = typeof shutdown

function closeServerHook(server: Closeable): LifecycleHook {
  return {
    name: "server.close",
    fn: ({ signal }) => closeUntilAborted(server, signal),
  }
}

/** Resolves when the server closes or the signal aborts, whichever comes first. */
function closeUntilAborted(server: Closeable, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve()

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => resolve()
    signal.addEventListener("abort", onAbort, { once: true })

    server.close((err) => {
      signal.removeEventListener("abort", onAbort)

      if (err) reject(err)
      else resolve()
    })
  })
}
