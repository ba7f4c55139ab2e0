import { type AppError, type ErrorCode, isAppError } from "@bucket-index/errors"
import type { StatusCode } from "../http/status-codes"

export type ErrorMapping = {
  status: StatusCode

  /** User-facing message. Never carries internal details. */
  message: string
}

export type FallbackMapping = ErrorMapping & {
  code: ErrorCode
}

export type ErrorContextTransformer = (
  error: AppError,
) => Record<string, unknown> | undefined

export interface ErrorMappingsConfig {
  /**
   * Error code to status/message.
   * Unmapped AppErrors use fallback status/message but keep their own code.
   */
  mappings: Partial<Record<ErrorCode, ErrorMapping>>

  /** For unmapped or unknown errors. */
  fallback?: FallbackMapping

  /**
   * Extra fields merged into the response body. Return undefined to add nothing.
   */
  transformContext?: ErrorContextTransformer
}

export type ErrorResponseBody = {
  status: StatusCode
  code: ErrorCode
  message: string
  requestId: string
  [key: string]: unknown
}

export type ErrorResponse = {
  error: ErrorResponseBody
}

export type ErrorFormatter = (error: unknown, requestId: string) => ErrorResponse

export const DEFAULT_FALLBACK: FallbackMapping = {
  code: "internal_error",
  status: 500,
  message: "Internal Server Error",
}

/**
 * Maps thrown values to a response body.
 *
 * - mapped `AppError`s use their configured status/message
 * - unmapped `AppError`s keep their code with the fallback status/message
 * - anything else gets the fallback entirely
 */
export function createErrorFormatter(config: ErrorMappingsConfig): ErrorFormatter {
  const fallback = config.fallback ?? DEFAULT_FALLBACK

  return (error, requestId) => {
    if (!isAppError(error)) {
      return {
        error: {
          code: fallback.code,
          status: fallback.status,
          message: fallback.message,
          requestId,
        },
      }
    }

    const mapping = config.mappings[error.code]

    return {
      error: {
        ...extraFields(config, error),
        code: error.code,
        status: mapping?.status ?? fallback.status,
        message: mapping?.message ?? fallback.message,
        requestId,
      },
    }
  }
}

function extraFields(config: ErrorMappingsConfig, error: AppError): Record<string, unknown> {
  try {
    return config.transformContext?.(error) ?? {}
  } catch {
    return {}
  }
}
