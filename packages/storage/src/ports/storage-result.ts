import type { StorageObjectMetadata } from "./storage-object"

export interface ListResult {
  /** Objects of this page, in provider order */
  objects: StorageObjectMetadata[]

  /** Opaque token for next page. Undefined when no more results. */
  cursor?: string
}
