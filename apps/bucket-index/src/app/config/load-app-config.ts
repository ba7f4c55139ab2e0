import {
  type ConfigSource,
  DotenvSource,
  EnvSource,
  loadConfig,
  ObjectSource,
} from "@bucket-index/config"
import { type AppConfig, type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
      serviceName: env.SERVICE_NAME,
    },
    server: {
      host: env.HOST,
      port: env.PORT,
      shutdownTimeoutMs: env.SERVER_SHUTDOWN_TIMEOUT_MS,
      ...(env.SERVER_TRUSTED_PROXIES !== undefined && {
        trustedProxies: env.SERVER_TRUSTED_PROXIES,
      }),
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
    s3: {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
      region: env.AWS_DEFAULT_REGION,
      endpoint: env.ENDPOINT_URL,
      bucket: env.BUCKET,
    },
    listing: {
      publicDomain: env.PUBLIC_DOMAIN,
      pageSize: env.LISTING_PAGE_SIZE,
      encodeKeys: env.LISTING_ENCODE_KEYS,
      refreshCooldownMs: env.LISTING_REFRESH_COOLDOWN_MS,
      pageTitle: env.LISTING_PAGE_TITLE ?? `Index of ${env.BUCKET}`,
    },
  }
}

/**
 * Reads `.env.<APP_ENV>` (optional), then the environment, then `overrides`; later
 * sources win.
 *
 * @throws {ConfigError} naming every missing variable
 */
export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  overrides: Record<string, string> = {},
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const appEnv = overrides.APP_ENV ?? env.APP_ENV ?? "development"

  const sources: ConfigSource[] = [
    new DotenvSource({ file: `.env.${appEnv}`, required: false, cwd }),
    new EnvSource({ env }),
    new ObjectSource(overrides),
  ]

  const result = await loadConfig({ schema: envSchema, sources })

  return mapEnvToConfig(result.value)
}
