import type { Clock } from "@bucket-index/clock"
import type { StoragePort } from "../ports/storage"
import type {
  Bytes,
  StorageBucket,
  StorageKey,
  StorageObjectMetadata,
} from "../ports/storage-object"
import type { ListOptions } from "../ports/storage-options"
import type { ListResult } from "../ports/storage-result"

const DEFAULT_MAX_KEYS = 1000

export interface MemoryObjectSeed {
  key: StorageKey
  sizeInBytes: Bytes
  lastModified?: Date
}

interface StoredObject {
  sizeInBytes: Bytes
  lastModified: Date
}

export interface MemoryStorageDeps {
  clock: Clock
}

/**
 * In-process bucket listing for tests and local runs.
 *
 * Keys are returned in ascending order; the cursor is the first key of the next page.
 */
export class MemoryStorage implements StoragePort {
  private readonly buckets = new Map<StorageBucket, Map<StorageKey, StoredObject>>()

  constructor(private readonly deps: MemoryStorageDeps) {}

  seed(bucket: StorageBucket, objects: readonly MemoryObjectSeed[]): void {
    const bucketMap = this.getOrCreateBucket(bucket)

    for (const obj of objects) {
      bucketMap.set(obj.key, {
        sizeInBytes: obj.sizeInBytes,
        lastModified: obj.lastModified ?? this.deps.clock.now(),
      })
    }
  }

  remove(bucket: StorageBucket, key: StorageKey): void {
    this.buckets.get(bucket)?.delete(key)
  }

  clear(bucket?: StorageBucket): void {
    if (bucket === undefined) this.buckets.clear()
    else this.buckets.delete(bucket)
  }

  async list(bucket: StorageBucket, options?: ListOptions): Promise<ListResult> {
    const bucketMap = this.buckets.get(bucket)
    if (!bucketMap) return { objects: [] }

    const prefix = options?.prefix ?? ""
    const maxKeys = options?.maxKeys ?? DEFAULT_MAX_KEYS

    const keys = this.getFilteredSortedKeys(bucketMap, prefix, options?.cursor)

    const objects: StorageObjectMetadata[] = []
    let cursor: string | undefined

    for (const key of keys) {
      if (objects.length >= maxKeys) {
        cursor = key
        break
      }

      const stored = bucketMap.get(key)
      if (!stored) continue

      objects.push({ key, sizeInBytes: stored.sizeInBytes, lastModified: stored.lastModified })
    }

    return {
      objects,
      ...(cursor && { cursor }),
    }
  }

  private getOrCreateBucket(bucket: StorageBucket): Map<StorageKey, StoredObject> {
    let bucketMap = this.buckets.get(bucket)
    if (!bucketMap) {
      bucketMap = new Map()
      this.buckets.set(bucket, bucketMap)
    }
    return bucketMap
  }

  private getFilteredSortedKeys(
    bucketMap: Map<StorageKey, StoredObject>,
    prefix: string,
    cursor?: string,
  ): string[] {
    const keys = Array.from(bucketMap.keys())
      .filter((key) => key.startsWith(prefix))
      .sort()

    if (!cursor) return keys

    const startIndex = this.findFirstAtLeast(keys, cursor)
    return keys.slice(startIndex)
  }

  private findFirstAtLeast(sortedKeys: string[], value: string): number {
    let lo = 0
    let hi = sortedKeys.length

    while (lo < hi) {
      const mid = (lo + hi) >> 1

      const midValue = sortedKeys[mid]
      if (midValue === undefined) break

      if (midValue < value) {
        lo = mid + 1
      } else {
        hi = mid
      }
    }

    return lo
  }
}
