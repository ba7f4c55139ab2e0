export { MemorySingleflight } from "./adapters/memory/memory-single-flight"
export { createSingleflight } from "./create"
export type {
  FlightResult,
  FlightSource,
  InFlightKey,
  Singleflight,
} from "./ports/single-flight"
