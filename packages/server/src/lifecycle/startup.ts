import type { Clock, UnixMs } from "@bucket-index/clock"
import type { Logger } from "@bucket-index/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export type StartupContext = {
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
  startHooks: LifecycleHook[]
}

export type StartResult = { ok: boolean; failures: HookFailure[]; timedOut: boolean }

/** Runs start hooks fail-fast. The caller decides what a failed result means. */
export async function startup(ctx: StartupContext): Promise<StartResult> {
  ctx.logger.debug("Running start hooks", { count: ctx.startHooks.length })

  const { failures, timedOut } = await runHooks(
    { phase: "startup", clock: ctx.clock, logger: ctx.logger, deadlineMs: ctx.deadlineMs },
    ctx.startHooks,
    { failFast: true },
  )

  return { ok: failures.length === 0 && !timedOut, failures, timedOut }
}

export type StartupFn = typeof startup
