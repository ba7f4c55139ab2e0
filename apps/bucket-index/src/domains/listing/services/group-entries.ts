import { type Entry, type Group, UNGROUPED } from "../model/listing.model"

export function groupName(key: string): string {
  const slash = key.indexOf("/")

  return slash === -1 ? UNGROUPED : key.slice(0, slash)
}

/** Byte order of the UTF-8 encodings, reversed. */
function descending(a: string, b: string): number {
  return Buffer.compare(Buffer.from(b, "utf8"), Buffer.from(a, "utf8"))
}

/**
 * Partitions entries by the first path segment of their key. Listing order is kept
 * inside each group; groups come out in descending name order.
 */
export function groupEntries(entries: readonly Entry[]): Group[] {
  const byName = new Map<string, Entry[]>()

  for (const entry of entries) {
    const name = groupName(entry.key)
    const members = byName.get(name)

    if (members) members.push(entry)
    else byName.set(name, [entry])
  }

  return [...byName.keys()]
    .sort(descending)
    .map((name) => ({ name, entries: byName.get(name) ?? [] }))
}
