/** Sets `name` unless a handler already did. Header names are case-insensitive. */
export function setHeaderIfMissing(headers: Headers, name: string, value: string): void {
  if (!headers.has(name)) headers.set(name, value)
}
