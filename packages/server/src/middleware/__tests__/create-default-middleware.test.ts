import { NullLogger } from "@bucket-index/logger"
import { createApp } from "../../server/server"
import { resolveOptions, type ServerOptions } from "../../server/server-options"
import { createDefaultMiddleware } from "../create-default-middleware"

const base: ServerOptions = {
  port: 0,
  errorMappings: { mappings: {} },
  routes: () => {},
}

describe("createDefaultMiddleware", () => {
  function appWith(options: ServerOptions) {
    const app = createApp()

    for (const mw of createDefaultMiddleware(resolveOptions(options), new NullLogger())) {
      app.use("*", mw)
    }
    app.get("/", (c) => c.json({ requestId: c.get("requestId"), clientIp: c.get("clientIp") }))

    return app
  }

  it("builds the full chain", () => {
    expect(createDefaultMiddleware(resolveOptions(base), new NullLogger())).toHaveLength(5)
  })

  it("sets the request id before handlers and echoes it with security headers", async () => {
    const res = await appWith(base).request("/", { headers: { "x-request-id": "rid-1" } })

    expect(await res.json()).toMatchObject({ requestId: "rid-1" })
    expect(res.headers.get("x-request-id")).toBe("rid-1")
    expect(res.headers.get("x-frame-options")).toBe("DENY")
  })

  it("resolves the client ip through the trusted proxies", async () => {
    const res = await appWith({ ...base, trustedProxies: 1 }).request("/", {
      headers: { "x-forwarded-for": "203.0.113.7, 10.0.0.2" },
    })

    expect(await res.json()).toMatchObject({ clientIp: "203.0.113.7" })
  })

  it("applies the configured content security policy", async () => {
    const res = await appWith({
      ...base,
      securityHeaders: { contentSecurityPolicy: ["default-src 'none'"] },
    }).request("/")

    expect(res.headers.get("content-security-policy")).toBe("default-src 'none'")
  })
})
