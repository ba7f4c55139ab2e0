import { BaseError, type ErrorContext } from "@bucket-index/errors"

export type ListingErrorCode = "listing_failed" | "listing_not_ready"

export class ListingError extends BaseError<ListingErrorCode> {
  static failed(cause: unknown, context: ErrorContext = {}): ListingError {
    return new ListingError("Bucket listing failed", {
      code: "listing_failed",
      context,
      cause,
      isRetryable: true,
    })
  }

  static notReady(): ListingError {
    return new ListingError("No listing snapshot has been built yet", {
      code: "listing_not_ready",
      isOperational: false,
    })
  }
}
