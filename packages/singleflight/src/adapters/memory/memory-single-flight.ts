import type { FlightResult, InFlightKey, Singleflight } from "../../ports/single-flight"

interface InFlight<T> {
  promise: Promise<T>
  followerCount: number
}

export class MemorySingleflight<T> implements Singleflight<T> {
  private flights = new Map<InFlightKey, InFlight<T>>()

  async run(key: InFlightKey, fn: () => Promise<T>): Promise<FlightResult<T>> {
    const existing = this.flights.get(key)

    if (existing) {
      existing.followerCount++
      const value = await existing.promise

      return {
        value,
        isLeader: false,
        sharedWith: existing.followerCount,
        source: "inflight",
      }
    }

    const flight: InFlight<T> = {
      promise: fn(),
      followerCount: 0,
    }

    this.flights.set(key, flight)

    try {
      const value = await flight.promise
      return {
        value,
        isLeader: true,
        sharedWith: flight.followerCount,
        source: "leader",
      }
    } finally {
      this.flights.delete(key)
    }
  }

  isInFlight(key: InFlightKey): boolean {
    return this.flights.has(key)
  }
}
