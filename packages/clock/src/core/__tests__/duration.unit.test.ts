import { FakeClock } from "../../adapters/fake-clock"
import { elapsedSince, hours, minutes, seconds } from "../duration"

describe("duration helpers", () => {
  it("converts units to milliseconds", () => {
    expect(seconds(2)).toBe(2_000)
    expect(minutes(1.5)).toBe(90_000)
    expect(hours(12)).toBe(43_200_000)
  })

  it("elapsedSince() measures against the clock", () => {
    const clock = new FakeClock(10_000)

    clock.advance(seconds(3))

    expect(elapsedSince(clock, 10_000)).toBe(3_000)
    expect(elapsedSince(clock, 20_000)).toBe(-7_000)
  })
})
