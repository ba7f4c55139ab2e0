import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { type ConfigIssue, ConfigError } from "./config-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  /** @default [new EnvSource()] */
  sources?: ConfigSource[]
}

/**
 * Loads every source in order, merges them (later wins) and validates the result.
 *
 * @throws {ConfigError} listing every missing key, not just the first one
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    const issues: ConfigIssue[] = result.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }))

    throw ConfigError.invalid(
      missingKeys(result.error.issues, merged),
      issues,
      z.prettifyError(result.error),
    )
  }

  return new Config<T>(result.data, provenance, new Set(Object.keys(merged)))
}

function missingKeys(
  issues: ReadonlyArray<{ path: ReadonlyArray<PropertyKey> }>,
  merged: Record<string, unknown>,
): string[] {
  const missing = new Set<string>()

  for (const issue of issues) {
    const [head] = issue.path

    if (head === undefined) continue
    if (merged[String(head)] === undefined) missing.add(String(head))
  }

  return [...missing]
}
