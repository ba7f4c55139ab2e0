/**
 * Validated, frozen configuration plus a record of where each value came from.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ PORT: z.coerce.number().default(8000), BUCKET: z.string() }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.value.PORT       // 8000
 * config.explain("PORT")  // "default"
 * config.explain("BUCKET") // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /** Name of the source that supplied `key`, or `"default"` when the schema filled it in. */
  explain<K extends keyof T & string>(key: K): string

  /** Names of sources that supplied at least one value, in precedence order. */
  sourcesUsed(): string[]

  /** Keys present in the sources that the schema does not know. */
  unknownKeys(): string[]
}
