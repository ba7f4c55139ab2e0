import {
  listAllObjects,
  type StorageBucket,
  type StorageObjectMetadata,
  type StoragePort,
} from "@bucket-index/storage"
import { createEntry, type Entry, type EntrySource } from "../model/listing.model"
import { ListingError } from "../model/listing.errors"

export type BucketListerDeps = {
  storage: StoragePort
}

export type BucketListerOptions = {
  bucket: StorageBucket

  /** Prepended verbatim to each key to form the public URL. */
  publicDomain: string

  /** @default 1000 */
  pageSize?: number

  /**
   * Percent-encode each key segment when building URLs. Off by default, so keys are
   * concatenated as stored.
   * @default false
   */
  encodeKeys?: boolean
}

export function entryUrl(publicDomain: string, key: string, encodeKeys = false): string {
  if (!encodeKeys) return `${publicDomain}${key}`

  return `${publicDomain}${key.split("/").map(encodeURIComponent).join("/")}`
}

export class BucketLister implements EntrySource {
  constructor(
    private readonly deps: BucketListerDeps,
    private readonly opts: BucketListerOptions,
  ) {}

  async listAll(): Promise<Entry[]> {
    let objects: StorageObjectMetadata[]

    try {
      objects = await listAllObjects(this.deps.storage, this.opts.bucket, {
        maxKeys: this.opts.pageSize ?? 1000,
      })
    } catch (err) {
      throw ListingError.failed(err, { bucket: this.opts.bucket })
    }

    return objects.map((o) =>
      createEntry({
        key: o.key,
        url: entryUrl(this.opts.publicDomain, o.key, this.opts.encodeKeys),
        size: o.sizeInBytes,
        lastModified: o.lastModified,
      }),
    )
  }
}
