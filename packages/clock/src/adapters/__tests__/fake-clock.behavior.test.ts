import { FakeClock } from "../fake-clock"

describe("FakeClock behavior", () => {
  it("starts at the provided initial time", () => {
    const clock = new FakeClock(1000)

    expect(clock.nowMs()).toBe(1000)
    expect(clock.now().getTime()).toBe(1000)
  })

  it("defaults to the epoch", () => {
    expect(new FakeClock().nowMs()).toBe(0)
  })

  it("advance() moves time forward cumulatively", () => {
    const clock = new FakeClock(0)

    clock.advance(100)
    clock.advance(50)

    expect(clock.nowMs()).toBe(150)
  })

  it("set() jumps to an exact instant", () => {
    const clock = new FakeClock(0)

    clock.set(Date.UTC(2024, 0, 2, 3, 4, 5))

    expect(clock.now().toISOString()).toBe("2024-01-02T03:04:05.000Z")
  })
})
