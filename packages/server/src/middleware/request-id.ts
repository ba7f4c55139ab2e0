import { randomUUID } from "node:crypto"
import type { Middleware } from "../server/server"
import { isNonEmptyString } from "./utils/is-non-empty-string"
import { setHeaderIfMissing } from "./utils/set-header-if-missing"

export const REQUEST_ID_HEADER = "x-request-id"

/**
 * Takes the request ID from `x-request-id` (or generates one), stores it as `requestId`
 * on the context and echoes it on the response.
 */
export function requestIdMiddleware(generate: () => string = randomUUID): Middleware {
  return async (c, next) => {
    const fromHeader = c.req.header(REQUEST_ID_HEADER)
    const requestId = isNonEmptyString(fromHeader) ? fromHeader.trim() : generate()

    c.set("requestId", requestId)

    await next()

    setHeaderIfMissing(c.res.headers, REQUEST_ID_HEADER, requestId)
  }
}
