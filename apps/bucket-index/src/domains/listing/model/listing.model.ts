import type { UnixMs } from "@bucket-index/clock"
import type { SerializedError } from "@bucket-index/errors"
import type { Bytes, StorageKey } from "@bucket-index/storage"

/** Group for keys without a `/`. */
export const UNGROUPED = "Binários"

export type Entry = Readonly<{
  key: StorageKey
  url: string
  size: Bytes
  lastModifiedMs: UnixMs
}>

export type Group = Readonly<{
  name: string
  entries: readonly Entry[]
}>

/** One complete listing pass, grouped and pre-rendered. Replaced whole, never patched. */
export type Snapshot = Readonly<{
  entries: readonly Entry[]
  groups: readonly Group[]
  createdAtMs: UnixMs
  html: string
  json: string
}>

export type RefreshStatus = {
  lastSuccessAt: Date | null
  lastFailureAt: Date | null
  lastError: SerializedError | null
  consecutiveFailures: number
  refreshing: boolean
}

/** Produces the full, flat entry list of the bucket. */
export interface EntrySource {
  listAll(): Promise<Entry[]>
}

export function createEntry(input: {
  key: StorageKey
  url: string
  size: Bytes
  lastModified: Date
}): Entry {
  return Object.freeze({
    key: input.key,
    url: input.url,
    size: input.size,
    lastModifiedMs: input.lastModified.getTime(),
  })
}

export function createSnapshot(input: {
  entries: readonly Entry[]
  groups: readonly Group[]
  createdAt: Date
  html: string
  json: string
}): Snapshot {
  return Object.freeze({
    entries: Object.freeze([...input.entries]),
    groups: Object.freeze(
      input.groups.map((g) =>
        Object.freeze({ name: g.name, entries: Object.freeze([...g.entries]) }),
      ),
    ),
    createdAtMs: input.createdAt.getTime(),
    html: input.html,
    json: input.json,
  })
}
