export type InFlightKey = string

/**
 * Where the result originated from
 * - "leader": This caller executed the function
 * - "inflight": This caller waited on an in-flight call started by another
 */
export type FlightSource = "leader" | "inflight"

/**
 * Result of a singleflight call
 */
export interface FlightResult<T> {
  /** The resolved value */
  value: T

  /** Whether this caller executed the function */
  isLeader: boolean

  /** Number of other callers that shared this result (excluding leader) */
  sharedWith: number

  /** Where this result came from */
  source: FlightSource
}

/**
 * A group represents a namespace for deduplicating concurrent work.
 *
 * Multiple calls to `run()` with the same key while a call is in-flight
 * will share the same promise and receive identical results (shared fate).
 *
 * @example
 * ```ts
 * const group = createSingleflight<Snapshot>()
 *
 * // These three concurrent calls result in ONE bucket listing
 * const [a, b, c] = await Promise.all([
 *   group.run("snapshot", () => buildSnapshot()),
 *   group.run("snapshot", () => buildSnapshot()),
 *   group.run("snapshot", () => buildSnapshot()),
 * ])
 *
 * a.isLeader  // true
 * b.isLeader  // false
 * a.value === b.value === c.value  // same instance
 * ```
 */
export interface Singleflight<T> {
  /**
   * Execute fn() for key, deduplicating concurrent calls.
   *
   * If a call is already in-flight for this key, the returned promise
   * will resolve/reject with the same outcome (shared fate).
   *
   * Error behavior:
   * - All waiters receive the same Error instance
   * - Next call after failure starts fresh
   */
  run(key: InFlightKey, fn: () => Promise<T>): Promise<FlightResult<T>>

  /** `true` while a call for key is in flight. */
  isInFlight(key: InFlightKey): boolean
}
