import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only keys starting with `prefix` are read; the prefix is stripped. */
  prefix?: string

  /** @default process.env */
  env?: Record<string, string | undefined>

  /**
   * Keep variables set to the empty string. By default `FOO=` counts as unset,
   * so a required key left blank is reported as missing.
   *
   * @default false
   */
  keepEmpty?: boolean
}

export class EnvSource implements ConfigSource {
  readonly name = "env"

  constructor(private readonly options: EnvSourceOptions = {}) {}

  async load(): Promise<Record<string, unknown>> {
    const { prefix = "", keepEmpty = false } = this.options
    const env = this.options.env ?? process.env
    const values: Record<string, string> = {}

    for (const [key, value] of Object.entries(env)) {
      if (value === undefined) continue
      if (value === "" && !keepEmpty) continue
      if (!key.startsWith(prefix)) continue

      values[key.slice(prefix.length)] = value
    }

    return values
  }
}
