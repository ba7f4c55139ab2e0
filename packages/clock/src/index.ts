export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export { elapsedSince, hours, minutes, seconds } from "./core/duration"
export type { Clock } from "./ports/clock"
export type * from "./ports/time"
