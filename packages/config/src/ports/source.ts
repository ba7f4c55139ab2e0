/**
 * A source of raw configuration values.
 *
 * Sources only load; validation, coercion and merging happen in `loadConfig`.
 * Later sources override earlier ones. A key mapped to `undefined` counts as not provided.
 */
export interface ConfigSource {
  /** Used for provenance, e.g. "env" or "dotenv:.env.production". */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
