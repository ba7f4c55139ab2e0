import type { Context, Middleware } from "../server/server"
import { isNonEmptyString } from "./utils/is-non-empty-string"

/**
 * Picks the client address out of X-Forwarded-For, given how many proxies at the end of
 * the chain are trusted.
 *
 * XFF: "client, proxy1, proxy2" (proxy2 is closest to this server)
 * trustedProxies = 1 -> "proxy1"
 * trustedProxies = 2 -> "client"
 */
export function ipFromXForwardedFor(
  xForwardedFor: string,
  trustedProxies: number,
): string | undefined {
  if (trustedProxies <= 0) return undefined

  const chain = xForwardedFor
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)

  return chain[chain.length - 1 - trustedProxies]
}

/** `::ffff:10.0.0.1` -> `10.0.0.1` */
function normalizeRemoteAddress(ip: string): string {
  return ip.startsWith("::ffff:") ? ip.slice("::ffff:".length) : ip
}

function remoteAddress(c: Context): string | undefined {
  const raw = c.env?.incoming?.socket.remoteAddress

  return isNonEmptyString(raw) ? normalizeRemoteAddress(raw.trim()) : undefined
}

/**
 * Sets `remoteIp` (socket peer) and `clientIp` (from X-Forwarded-For when proxies are
 * trusted, otherwise the peer) on the context.
 */
export function clientIpMiddleware(trustedProxies?: number): Middleware {
  const proxies = Math.max(0, trustedProxies ?? 0)

  return async (c, next) => {
    const remoteIp = remoteAddress(c)
    const xff = proxies > 0 ? c.req.header("x-forwarded-for") : undefined
    const forwardedIp = isNonEmptyString(xff) ? ipFromXForwardedFor(xff, proxies) : undefined
    const clientIp = forwardedIp ?? remoteIp

    if (remoteIp !== undefined) c.set("remoteIp", remoteIp)
    if (clientIp !== undefined) c.set("clientIp", clientIp)

    await next()
  }
}
