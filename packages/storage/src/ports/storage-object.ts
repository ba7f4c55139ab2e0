export type Bytes = number

/**
 * Unique identifier for an object within a bucket.
 * Typically a path-like string (e.g., "releases/v1.2.0/tool.tar.gz").
 */
export type StorageKey = string

/**
 * Name of a storage bucket.
 * Must conform to provider naming rules (e.g., lowercase, no underscores for S3).
 */
export type StorageBucket = string

/**
 * Object metadata returned by list().
 */
export type StorageObjectMetadata = {
  key: StorageKey
  sizeInBytes: Bytes
  lastModified: Date
  etag?: string
}
