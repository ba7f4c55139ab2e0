import { type _Object, ListObjectsV2Command, type S3Client } from "@aws-sdk/client-s3"
import type { Clock } from "@bucket-index/clock"
import { StorageError } from "../core/storage-error"
import type { StoragePort } from "../ports/storage"
import type { StorageBucket, StorageObjectMetadata } from "../ports/storage-object"
import type { ListOptions } from "../ports/storage-options"
import type { ListResult } from "../ports/storage-result"

export interface S3StorageDeps {
  client: S3Client
  clock: Clock
}

export class S3Storage implements StoragePort {
  constructor(readonly deps: S3StorageDeps) {}

  async list(bucket: StorageBucket, options?: ListOptions): Promise<ListResult> {
    try {
      const response = await this.deps.client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          ...(options?.prefix && { Prefix: options.prefix }),
          ...(options?.maxKeys && { MaxKeys: options.maxKeys }),
          ...(options?.cursor && { ContinuationToken: options.cursor }),
        }),
      )

      const next = response.IsTruncated ? response.NextContinuationToken : undefined

      return {
        objects: this.mapListContents(response.Contents),
        ...(next && { cursor: next }),
      }
    } catch (err) {
      throw new StorageError(`Failed to list bucket "${bucket}"`, {
        code: "storage_list_failed",
        context: { bucket, cursor: options?.cursor ?? null },
        cause: err,
        isRetryable: true,
      })
    }
  }

  private mapListContents(contents: _Object[] | undefined): StorageObjectMetadata[] {
    if (!contents) return []

    return contents
      .filter((obj): obj is _Object & { Key: string } => Boolean(obj.Key))
      .map((obj) => ({
        key: obj.Key,
        sizeInBytes: obj.Size ?? 0,
        lastModified: obj.LastModified ?? this.deps.clock.now(),
        ...(obj.ETag && { etag: obj.ETag }),
      }))
  }
}
