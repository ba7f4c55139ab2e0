import type { Middleware } from "../server/server"
import { setHeaderIfMissing } from "./utils/set-header-if-missing"

export type FrameOptions = "DENY" | "SAMEORIGIN"

export type ReferrerPolicy =
  | "no-referrer"
  | "no-referrer-when-downgrade"
  | "origin"
  | "origin-when-cross-origin"
  | "same-origin"
  | "strict-origin"
  | "strict-origin-when-cross-origin"
  | "unsafe-url"

export type CrossOriginOpenerPolicy =
  | "same-origin"
  | "same-origin-allow-popups"
  | "unsafe-none"

export type CrossOriginResourcePolicy = "same-origin" | "same-site" | "cross-origin"

/**
 * Response security headers. `false` omits a header; a value overrides the default.
 * Headers already set by a handler are left alone.
 *
 * @see {@link https://owasp.org/www-project-secure-headers | OWASP Secure Headers Project}
 */
export interface SecurityHeadersConfig {
  /** @default "nosniff" */
  contentTypeOptions?: false | "nosniff"

  /** @default "DENY" */
  frameOptions?: false | FrameOptions

  /** @default "strict-origin-when-cross-origin" */
  referrerPolicy?: false | ReferrerPolicy

  /** @default "same-origin" */
  crossOriginOpenerPolicy?: false | CrossOriginOpenerPolicy

  /** @default "same-origin" */
  crossOriginResourcePolicy?: false | CrossOriginResourcePolicy

  /** @default "no-store, max-age=0" */
  cacheControl?: false | string

  /** CSP directives, joined with "; ". */
  contentSecurityPolicy?: false | string[]

  /** Permissions-Policy directives, joined with ", ". */
  permissionsPolicy?: false | string[]

  /**
   * Headers removed from every response.
   * @default ["Server", "X-Powered-By"]
   */
  suppress?: string[]
}

export const DEFAULT_CONTENT_SECURITY_POLICY: readonly string[] = [
  "default-src 'self'",
  "base-uri 'self'",
  "form-action 'self'",
  "frame-ancestors 'none'",
  "object-src 'none'",
]

const DEFAULT_PERMISSIONS_POLICY: readonly string[] = [
  "camera=()",
  "geolocation=()",
  "microphone=()",
  "payment=()",
  "usb=()",
]

function directives(
  value: false | string[] | undefined,
  fallback: readonly string[],
  separator: string,
): string | null {
  if (value === false) return null

  const list = value ?? fallback
  return list.length > 0 ? list.join(separator) : null
}

function single(value: false | string | undefined, fallback: string): string | null {
  if (value === false) return null

  return value ?? fallback
}

export function resolveSecurityHeaders(
  config: SecurityHeadersConfig = {},
): Array<[name: string, value: string]> {
  const headers: Array<[string, string | null]> = [
    ["X-Content-Type-Options", single(config.contentTypeOptions, "nosniff")],
    ["X-Frame-Options", single(config.frameOptions, "DENY")],
    ["Referrer-Policy", single(config.referrerPolicy, "strict-origin-when-cross-origin")],
    ["Cross-Origin-Opener-Policy", single(config.crossOriginOpenerPolicy, "same-origin")],
    [
      "Cross-Origin-Resource-Policy",
      single(config.crossOriginResourcePolicy, "same-origin"),
    ],
    ["Cache-Control", single(config.cacheControl, "no-store, max-age=0")],
    [
      "Content-Security-Policy",
      directives(config.contentSecurityPolicy, DEFAULT_CONTENT_SECURITY_POLICY, "; "),
    ],
    [
      "Permissions-Policy",
      directives(config.permissionsPolicy, DEFAULT_PERMISSIONS_POLICY, ", "),
    ],
  ]

  return headers.filter((h): h is [string, string] => h[1] !== null)
}

export function securityHeadersMiddleware(config: SecurityHeadersConfig = {}): Middleware {
  const headers = resolveSecurityHeaders(config)
  const suppressed = config.suppress ?? ["Server", "X-Powered-By"]

  return async (c, next) => {
    await next()

    for (const name of suppressed) c.res.headers.delete(name)
    for (const [name, value] of headers) setHeaderIfMissing(c.res.headers, name, value)
  }
}
