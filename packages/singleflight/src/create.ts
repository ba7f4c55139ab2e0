import { MemorySingleflight } from "./adapters/memory/memory-single-flight"
import type { Singleflight } from "./ports/single-flight"

export function createSingleflight<T>(): Singleflight<T> {
  return new MemorySingleflight<T>()
}
