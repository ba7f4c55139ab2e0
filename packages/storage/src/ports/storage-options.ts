export interface ListOptions {
  /** Filter to objects starting with this prefix (e.g., "releases/") */
  prefix?: string

  /** Max objects to return per page */
  maxKeys?: number

  /** Opaque token from previous ListResult for pagination */
  cursor?: string
}
