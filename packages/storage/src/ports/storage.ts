import type { StorageBucket } from "./storage-object"
import type { ListOptions } from "./storage-options"
import type { ListResult } from "./storage-result"

export interface StoragePort {
  /** List one page of objects in a bucket. Use cursor for pagination. */
  list(bucket: StorageBucket, options?: ListOptions): Promise<ListResult>
}
