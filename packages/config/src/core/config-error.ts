import { BaseError } from "@bucket-index/errors"

export type ConfigIssue = { path: string; message: string }

export class ConfigError extends BaseError<"config_invalid"> {
  static invalid(missing: string[], issues: ConfigIssue[], report: string): ConfigError {
    const headline =
      missing.length > 0
        ? `Missing environment variable(s): ${missing.join(", ")}`
        : "Configuration validation failed"

    return new ConfigError(`${headline}\n${report}`, {
      code: "config_invalid",
      context: { missing, issues },
      isOperational: false,
    })
  }

  get missing(): string[] {
    const { missing } = this.context

    return Array.isArray(missing) ? missing.map(String) : []
  }
}
