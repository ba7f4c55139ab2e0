import type { Logger } from "@bucket-index/logger"
import { type MockProxy, mock } from "vitest-mock-extended"
import { createApp } from "../../server/server"
import { requestLoggingMiddleware } from "../request-logging"

describe("requestLoggingMiddleware", () => {
  let logger: MockProxy<Logger>

  beforeEach(() => {
    logger = mock<Logger>()
  })

  function appWith() {
    const app = createApp()

    app.use("*", async (c, next) => {
      c.set("requestId", "req-1")
      await next()
    })
    app.use("*", requestLoggingMiddleware(logger, ["/health"]))
    app.get("/", (c) => c.text("ok"))
    app.get("/health", (c) => c.text("ok"))
    app.get("/health/deep", (c) => c.text("ok"))
    app.get("/healthz", (c) => c.text("ok"))
    app.get("/broken", (c) => c.text("down", 503))

    return app
  }

  it("logs one line per request at info", async () => {
    await appWith().request("/", { headers: { "user-agent": "curl/8.0" } })

    expect(logger.info).toHaveBeenCalledTimes(1)
    expect(logger.info).toHaveBeenCalledWith("Request completed", {
      requestId: "req-1",
      method: "GET",
      path: "/",
      status: 200,
      durationMs: expect.any(Number),
      userAgent: "curl/8.0",
    })
  })

  it("logs 5xx responses at error", async () => {
    await appWith().request("/broken")

    expect(logger.info).not.toHaveBeenCalled()
    expect(logger.error).toHaveBeenCalledWith(
      "Request completed",
      expect.objectContaining({ path: "/broken", status: 503 }),
    )
  })

  it("skips ignored paths and their sub-paths only", async () => {
    const app = appWith()

    await app.request("/health")
    await app.request("/health/deep")
    expect(logger.info).not.toHaveBeenCalled()

    await app.request("/healthz")
    expect(logger.info).toHaveBeenCalledWith(
      "Request completed",
      expect.objectContaining({ path: "/healthz" }),
    )
  })
})
