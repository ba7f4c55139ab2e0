import type { StoragePort } from "../ports/storage"
import type { StorageBucket, StorageObjectMetadata } from "../ports/storage-object"
import type { ListOptions } from "../ports/storage-options"
import { StorageError } from "./storage-error"

export type ListAllOptions = Omit<ListOptions, "cursor">

/**
 * Follow the cursor until the provider reports no more pages.
 *
 * Any page failure rejects the whole call; callers never see a partial listing.
 */
export async function listAllObjects(
  storage: StoragePort,
  bucket: StorageBucket,
  options: ListAllOptions = {},
): Promise<StorageObjectMetadata[]> {
  const objects: StorageObjectMetadata[] = []
  const used = new Set<string>()
  let cursor: string | undefined

  for (;;) {
    const page = await storage.list(bucket, { ...options, ...(cursor && { cursor }) })
    objects.push(...page.objects)

    if (page.cursor === undefined) return objects

    if (used.has(page.cursor)) {
      throw new StorageError(`Listing of bucket "${bucket}" returned a repeated cursor`, {
        code: "storage_cursor_stalled",
        context: { bucket, cursor: page.cursor, pages: used.size + 1 },
      })
    }

    used.add(page.cursor)
    cursor = page.cursor
  }
}
