import { FakeClock } from "@bucket-index/clock"
import type { Logger } from "@bucket-index/logger"
import { type MockProxy, mock } from "vitest-mock-extended"
import type { LifecycleHook } from "../lifecycle-hook"
import { startup } from "../startup"
import { StartupError } from "../startup-error"

describe("startup", () => {
  let logger: MockProxy<Logger>
  let clock: FakeClock

  beforeEach(() => {
    logger = mock<Logger>()
    clock = new FakeClock(0)
  })

  const run = (startHooks: LifecycleHook[], deadlineMs = 10_000) =>
    startup({ clock, logger, deadlineMs, startHooks })

  it("is ok when every start hook succeeds", async () => {
    const result = await run([{ name: "listing:snapshot", fn: async () => {} }])

    expect(result).toStrictEqual({ ok: true, failures: [], timedOut: false })
    expect(logger.debug).toHaveBeenCalledWith("Running start hooks", { count: 1 })
  })

  it("fails fast on the first broken hook", async () => {
    const later = vi.fn(async () => {})
    const cause = new Error("bucket unreachable")

    const result = await run([
      {
        name: "listing:snapshot",
        fn: async () => {
          throw cause
        },
      },
      { name: "later", fn: later },
    ])

    expect(later).not.toHaveBeenCalled()
    expect(result).toStrictEqual({
      ok: false,
      failures: [{ hook: "listing:snapshot", error: cause }],
      timedOut: false,
    })
  })

  it("is not ok when the deadline passes", async () => {
    const result = await run([{ name: "slow", fn: async () => clock.advance(20_000) }])

    expect(result).toStrictEqual({ ok: false, failures: [], timedOut: true })
  })
})

describe("StartupError", () => {
  it("names the failed hooks and keeps the first cause", () => {
    const cause = new Error("bucket unreachable")

    const err = StartupError.fromResult({
      ok: false,
      failures: [{ hook: "listing:snapshot", error: cause }],
      timedOut: false,
    })

    expect(err.message).toBe("Server startup failed in hook(s): listing:snapshot")
    expect(err.code).toBe("server_startup_failed")
    expect(err.context).toStrictEqual({ hooks: ["listing:snapshot"], timedOut: false })
    expect(err.cause).toBe(cause)
    expect(err.isOperational).toBe(false)
  })

  it("reports a timeout", () => {
    const err = StartupError.fromResult({ ok: false, failures: [], timedOut: true })

    expect(err.message).toBe("Server startup timed out")
    expect(err.cause).toBeUndefined()
  })
})
