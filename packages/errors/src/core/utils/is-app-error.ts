import type { AppError } from "../../ports/error"
import { BaseError } from "../base-error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Structural guard for {@link AppError}.
 *
 * Accepts any object with the AppError shape, not just `BaseError` instances, so errors
 * crossing package copies (or created by hand in tests) are still recognized.
 */
export function isAppError(e: unknown): e is AppError {
  if (e instanceof BaseError) return true
  if (!(e instanceof Error)) return false

  const fields: Record<string, unknown> = { ...e }
  const { code, context, isRetryable, isOperational, timestamp } = fields

  return (
    typeof code === "string" &&
    isRecord(context) &&
    typeof isRetryable === "boolean" &&
    typeof isOperational === "boolean" &&
    timestamp instanceof Date &&
    Number.isFinite(timestamp.valueOf())
  )
}

