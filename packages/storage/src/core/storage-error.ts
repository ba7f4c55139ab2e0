import { BaseError } from "@bucket-index/errors"

export type StorageErrorCode = "storage_list_failed" | "storage_cursor_stalled"

export class StorageError extends BaseError<StorageErrorCode> {}
