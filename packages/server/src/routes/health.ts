import type { Milliseconds } from "@bucket-index/clock"
import type { Application } from "../server/server"
import type { ReadinessCheck } from "../server/server-options"

export const LIVENESS_PATH = "/health"
export const READINESS_PATH = "/ready"

const CHECK_TIMEOUT_MS: Milliseconds = 5_000

const NO_STORE = { "Cache-Control": "no-store" } as const

type CheckOutcome = { ok: true } | { ok: false; reason: string }

/**
 * Liveness always answers 200. Readiness answers 503 with a reason until the server
 * has started, then runs each check in order and reports the first that fails.
 */
export function registerHealthRoutes(
  app: Application,
  checks: ReadinessCheck[],
  isReady: () => boolean,
): void {
  app.get(LIVENESS_PATH, (c) => c.json({ ok: true }, 200, NO_STORE))

  app.get(READINESS_PATH, async (c) => {
    const outcome = isReady()
      ? await firstFailure(checks)
      : { ok: false as const, reason: "starting" }

    return outcome.ok
      ? c.json({ ok: true }, 200, NO_STORE)
      : c.json({ ok: false, reason: outcome.reason }, 503, NO_STORE)
  })
}

async function firstFailure(checks: ReadinessCheck[]): Promise<CheckOutcome> {
  for (const check of checks) {
    const outcome = await runCheck(check, CHECK_TIMEOUT_MS)
    if (!outcome.ok) return outcome
  }

  return { ok: true }
}

async function runCheck(check: ReadinessCheck, timeoutMs: Milliseconds): Promise<CheckOutcome> {
  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined

  const timeout = new Promise<CheckOutcome>((resolve) => {
    timer = setTimeout(() => {
      controller.abort()
      resolve({ ok: false, reason: `${check.name}:timeout` })
    }, timeoutMs)
  })

  const attempt = check
    .fn(controller.signal)
    .then((healthy): CheckOutcome => (healthy ? { ok: true } : { ok: false, reason: check.name }))
    .catch((): CheckOutcome => ({ ok: false, reason: `${check.name}:error` }))

  try {
    return await Promise.race([attempt, timeout])
  } finally {
    clearTimeout(timer)
  }
}
