import type { ContentfulStatusCode } from "hono/utils/http-status"

/** Status codes that may carry a response body. */
export type StatusCode = ContentfulStatusCode
