import type { Clock, Milliseconds, UnixMs } from "@bucket-index/clock"
import type { Logger } from "@bucket-index/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"

export type HookPhase = "startup" | "shutdown"

export type RunHooksContext = {
  phase: HookPhase
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
}

export type RunHooksPolicy = {
  /** Stop at the first failing hook. Startup uses this; shutdown runs everything. */
  failFast?: boolean
}

export type RunHooksResult = {
  failures: HookFailure[]
  timedOut: boolean
}

type HookOutcome = { failure?: HookFailure; timedOut: boolean }

/**
 * Runs hooks one after another under a shared deadline.
 *
 * Each hook receives an AbortSignal that fires when the deadline passes; hooks left
 * when the deadline is hit are skipped.
 */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: LifecycleHook[],
  policy: RunHooksPolicy = {},
): Promise<RunHooksResult> {
  const failures: HookFailure[] = []

  for (const hook of hooks) {
    const outcome = await runHook(ctx, hook)

    if (outcome.failure) failures.push(outcome.failure)
    if (outcome.timedOut) return { failures, timedOut: true }
    if (outcome.failure && policy.failFast) return { failures, timedOut: false }
  }

  return { failures, timedOut: false }
}

async function runHook(ctx: RunHooksContext, hook: LifecycleHook): Promise<HookOutcome> {
  const remaining = remainingMs(ctx)
  const meta = { phase: ctx.phase, hook: hook.name }

  if (remaining <= 0) {
    ctx.logger.warn("Lifecycle deadline reached, skipping remaining hooks", meta)
    return { timedOut: true }
  }

  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), remaining)

  try {
    await hook.fn({ signal: controller.signal, timeRemainingMs: remaining })

    if (pastDeadline(ctx, controller)) {
      ctx.logger.warn("Lifecycle hook finished after the deadline", meta)
      return { timedOut: true }
    }

    ctx.logger.info(`Executed ${ctx.phase} hook: ${hook.name}`, meta)
    return { timedOut: false }
  } catch (err) {
    ctx.logger.error(`Lifecycle hook failed: ${hook.name}`, { ...meta, err })

    return {
      failure: { hook: hook.name, error: err },
      timedOut: pastDeadline(ctx, controller),
    }
  } finally {
    clearTimeout(timer)
  }
}

function pastDeadline(ctx: RunHooksContext, controller: AbortController): boolean {
  return controller.signal.aborted || ctx.clock.nowMs() >= ctx.deadlineMs
}

function remainingMs(ctx: RunHooksContext): Milliseconds {
  return Math.max(0, ctx.deadlineMs - ctx.clock.nowMs())
}
