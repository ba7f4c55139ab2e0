import { S3Client } from "@aws-sdk/client-s3"
import type { Clock } from "@bucket-index/clock"
import type { StoragePort } from "../ports/storage"
import { S3Storage } from "./s3-storage"

export interface CreateS3ClientOptions {
  region: string
  endpoint: string
  accessKeyId: string
  secretAccessKey: string
}

/**
 * S3 client for S3-compatible providers. Path-style addressing, one attempt per request.
 */
export function createS3Client(options: CreateS3ClientOptions): S3Client {
  return new S3Client({
    region: options.region,
    endpoint: options.endpoint,
    forcePathStyle: true,
    maxAttempts: 1,
    credentials: {
      accessKeyId: options.accessKeyId,
      secretAccessKey: options.secretAccessKey,
    },
  })
}

export interface CreateS3StorageOptions {
  client: S3Client
  clock: Clock
}

export function createS3Storage(options: CreateS3StorageOptions): StoragePort {
  return new S3Storage({ client: options.client, clock: options.clock })
}
