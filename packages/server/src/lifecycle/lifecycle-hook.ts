import type { Milliseconds } from "@bucket-index/clock"

export interface LifecycleHookContext {
  signal: AbortSignal
  timeRemainingMs: Milliseconds
}

/** A named async step run before listening (start) or after closing (stop). */
export interface LifecycleHook {
  name: string
  fn: (ctx: LifecycleHookContext) => Promise<void>
}

export interface HookFailure {
  hook: string
  error: unknown
}
