export { S3Client } from "@aws-sdk/client-s3"
export {
  type CreateS3ClientOptions,
  type CreateS3StorageOptions,
  createS3Client,
  createS3Storage,
} from "./adapters/create"
export { type MemoryObjectSeed, MemoryStorage } from "./adapters/memory-storage"
export { S3Storage } from "./adapters/s3-storage"
export { type ListAllOptions, listAllObjects } from "./core/list-all-objects"
export { StorageError, type StorageErrorCode } from "./core/storage-error"
export type { StoragePort } from "./ports/storage"
export type {
  Bytes,
  StorageBucket,
  StorageKey,
  StorageObjectMetadata,
} from "./ports/storage-object"
export type { ListOptions } from "./ports/storage-options"
export type { ListResult } from "./ports/storage-result"
