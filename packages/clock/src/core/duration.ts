import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

const SECOND: Milliseconds = 1_000
const MINUTE: Milliseconds = 60 * SECOND
const HOUR: Milliseconds = 60 * MINUTE

export function seconds(n: number): Milliseconds {
  return n * SECOND
}

export function minutes(n: number): Milliseconds {
  return n * MINUTE
}

export function hours(n: number): Milliseconds {
  return n * HOUR
}

/** Milliseconds elapsed on `clock` since `since`. Negative if `since` is in the future. */
export function elapsedSince(clock: Clock, since: UnixMs): Milliseconds {
  return clock.nowMs() - since
}
