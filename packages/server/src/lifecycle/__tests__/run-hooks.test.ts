import { FakeClock } from "@bucket-index/clock"
import type { Logger } from "@bucket-index/logger"
import { type MockProxy, mock } from "vitest-mock-extended"
import type { LifecycleHook } from "../lifecycle-hook"
import { runHooks } from "../run-hooks"

describe("runHooks", () => {
  let logger: MockProxy<Logger>
  let clock: FakeClock

  beforeEach(() => {
    logger = mock<Logger>()
    clock = new FakeClock(1_000)
  })

  const ctx = (deadlineMs = 100_000) => ({
    phase: "startup" as const,
    clock,
    logger,
    deadlineMs,
  })

  it("runs hooks in declaration order", async () => {
    const order: string[] = []
    const hooks: LifecycleHook[] = ["one", "two", "three"].map((name) => ({
      name,
      fn: async () => void order.push(name),
    }))

    const result = await runHooks(ctx(), hooks)

    expect(order).toStrictEqual(["one", "two", "three"])
    expect(result).toStrictEqual({ failures: [], timedOut: false })
  })

  it("logs each executed hook with its phase", async () => {
    await runHooks(ctx(), [{ name: "warm-cache", fn: async () => {} }])

    expect(logger.info).toHaveBeenCalledWith("Executed startup hook: warm-cache", {
      phase: "startup",
      hook: "warm-cache",
    })
  })

  it("keeps going after a failure unless failFast is set", async () => {
    const boom = new Error("boom")
    const ran: string[] = []

    const hooks: LifecycleHook[] = [
      {
        name: "broken",
        fn: async () => {
          throw boom
        },
      },
      { name: "after", fn: async () => void ran.push("after") },
    ]

    const result = await runHooks(ctx(), hooks, { failFast: false })

    expect(ran).toStrictEqual(["after"])
    expect(result).toStrictEqual({
      failures: [{ hook: "broken", error: boom }],
      timedOut: false,
    })
    expect(logger.error).toHaveBeenCalledWith("Lifecycle hook failed: broken", {
      phase: "startup",
      hook: "broken",
      err: boom,
    })
  })

  it("stops at the first failure with failFast", async () => {
    const ran: string[] = []

    const hooks: LifecycleHook[] = [
      {
        name: "broken",
        fn: async () => {
          throw new Error("nope")
        },
      },
      { name: "after", fn: async () => void ran.push("after") },
    ]

    const result = await runHooks(ctx(), hooks, { failFast: true })

    expect(ran).toStrictEqual([])
    expect(result.failures.map((f) => f.hook)).toStrictEqual(["broken"])
  })

  it("skips every hook when the deadline already passed", async () => {
    const fn = vi.fn(async () => {})

    const result = await runHooks(ctx(1_000), [{ name: "late", fn }])

    expect(fn).not.toHaveBeenCalled()
    expect(result).toStrictEqual({ failures: [], timedOut: true })
    expect(logger.warn).toHaveBeenCalledWith(
      "Lifecycle deadline reached, skipping remaining hooks",
      { phase: "startup", hook: "late" },
    )
  })

  it("passes the remaining time and a live signal to each hook", async () => {
    const seen: Array<{ remaining: number; aborted: boolean }> = []

    await runHooks(ctx(6_000), [
      {
        name: "inspect",
        fn: async ({ signal, timeRemainingMs }) => {
          seen.push({ remaining: timeRemainingMs, aborted: signal.aborted })
        },
      },
    ])

    expect(seen).toStrictEqual([{ remaining: 5_000, aborted: false }])
  })

  it("reports a timeout when a hook finishes past the deadline", async () => {
    const next = vi.fn(async () => {})

    const result = await runHooks(ctx(2_000), [
      { name: "slow", fn: async () => clock.advance(5_000) },
      { name: "next", fn: next },
    ])

    expect(result).toStrictEqual({ failures: [], timedOut: true })
    expect(next).not.toHaveBeenCalled()
    expect(logger.warn).toHaveBeenCalledWith("Lifecycle hook finished after the deadline", {
      phase: "startup",
      hook: "slow",
    })
  })
})
