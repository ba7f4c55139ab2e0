import { FakeClock } from "@bucket-index/clock"
import { StartupError } from "@bucket-index/server"
import { MemoryStorage, type StoragePort } from "@bucket-index/storage"
import { createTestHarness, TEST_BUCKET, TEST_START_MS } from "../../tests/test-harness"

describe("server startup", () => {
  it("aborts without listening when the initial listing fails", async () => {
    const unreachable: StoragePort = {
      list: () => Promise.reject(new Error("getaddrinfo ENOTFOUND storage.test")),
    }
    const harness = await createTestHarness({ storage: unreachable })

    const err = await harness.server.start().catch((e: unknown) => e)

    expect(err).toBeInstanceOf(StartupError)
    expect(err).toMatchObject({
      code: "server_startup_failed",
      message: "Server startup failed in hook(s): listing:snapshot",
      cause: expect.objectContaining({ code: "listing_failed" }),
    })
    expect(harness.server.getState()).toBe("idle")
    expect(harness.ctx.services.domains.listing.cache.isHealthy()).toBe(false)
  })

  it("builds the first snapshot in the start hook", async () => {
    const clock = new FakeClock(TEST_START_MS)
    const storage = new MemoryStorage({ clock })
    storage.seed(TEST_BUCKET, [{ key: "root.txt", sizeInBytes: 5 }])
    const list = vi.spyOn(storage, "list")

    const harness = await createTestHarness({ storage, clock })
    await harness.lifecycle.start()

    const cache = harness.ctx.services.domains.listing.cache
    expect(list).toHaveBeenCalledTimes(1)
    expect(cache.isHealthy()).toBe(true)
    expect(cache.current().createdAtMs).toBe(TEST_START_MS)

    await harness.lifecycle.stop()
  })
})
