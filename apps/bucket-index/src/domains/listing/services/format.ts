const UNIT = 1024
const PREFIXES = "KMGTPE"

/**
 * Base-1024 size with one decimal: `1023` -> `"1023 B"`, `1024` -> `"1.0 KB"`,
 * `1048576` -> `"1.0 MB"`.
 */
export function humanReadableSize(bytes: number): string {
  if (bytes < UNIT) return `${bytes} B`

  let div = UNIT
  let exp = 0

  for (let n = Math.floor(bytes / UNIT); n >= UNIT; n = Math.floor(n / UNIT)) {
    div *= UNIT
    exp++
  }

  return `${(bytes / div).toFixed(1)} ${PREFIXES.charAt(exp)}B`
}

/** Last `/` segment of a key. */
export function shortName(key: string): string {
  return key.slice(key.lastIndexOf("/") + 1)
}

/** `YYYY-MM-DD HH:MM:SS`, UTC. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ")
}
