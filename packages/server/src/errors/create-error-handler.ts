import type { ErrorCode } from "@bucket-index/errors"
import type { Logger } from "@bucket-index/logger"
import type { ErrorHandler as HonoErrorHandler } from "hono"
import type { StatusCode } from "../http/status-codes"
import type { ServerEnv } from "../types/context"
import { createErrorFormatter, type ErrorMappingsConfig } from "./errors"

export type ErrorHandler = HonoErrorHandler<ServerEnv>

/** Formats errors through the code mappings and logs every failed request. */
export function createErrorHandler(mappings: ErrorMappingsConfig, logger: Logger): ErrorHandler {
  const format = createErrorFormatter(mappings)

  return (err, c) => {
    const requestId = c.get("requestId") ?? "unknown"
    const response = format(err, requestId)

    logError(c.get("logger") ?? logger, err, {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: response.error.status,
      code: response.error.code,
    })

    return c.json(response, response.error.status)
  }
}

export type CreateErrorHandlerFn = typeof createErrorHandler

type ErrorLogMeta = {
  requestId: string
  method: string
  path: string
  status: StatusCode
  code: ErrorCode
}

/** 5xx log at `error` with the cause chain; 4xx at `info`, with `err` only at `debug`. */
function logError(logger: Logger, err: unknown, meta: ErrorLogMeta): void {
  if (meta.status >= 500) {
    logger.error("Request failed", { ...meta, err })
    return
  }

  logger.info("Request failed", meta)
  logger.debug("Request failed details", { ...meta, err })
}
