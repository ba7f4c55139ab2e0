import type { Milliseconds } from "@bucket-index/clock"
import { type LogLevelName, logLevelNames } from "@bucket-index/logger"
import { z } from "zod"

const required = z.string().trim().min(1)

export const appEnvs = ["development", "test", "production"] as const

export type AppEnv = (typeof appEnvs)[number]

export const envSchema = z.object({
  AWS_ACCESS_KEY_ID: required,
  AWS_SECRET_ACCESS_KEY: required,
  AWS_DEFAULT_REGION: required,
  ENDPOINT_URL: z.url(),
  BUCKET: required,
  PUBLIC_DOMAIN: required,

  PORT: z.coerce.number().int().min(0).max(65_535).default(8000),
  HOST: z.string().default("0.0.0.0"),
  APP_ENV: z.enum(appEnvs).default("development"),
  SERVICE_NAME: z.string().default("bucket-index"),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),

  SERVER_SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(10_000),
  SERVER_TRUSTED_PROXIES: z.coerce.number().int().nonnegative().optional(),

  LISTING_PAGE_SIZE: z.coerce.number().int().min(1).max(1000).default(1000),
  LISTING_ENCODE_KEYS: z.stringbool().default(false),
  LISTING_REFRESH_COOLDOWN_MS: z.coerce.number().int().nonnegative().default(0),
  LISTING_PAGE_TITLE: z.string().optional(),
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  app: {
    env: AppEnv
    serviceName: string
  }

  server: {
    host: string
    port: number
    shutdownTimeoutMs: Milliseconds
    trustedProxies?: number
  }

  logging: {
    level: LogLevelName
    prettify: boolean
  }

  s3: {
    accessKeyId: string
    secretAccessKey: string
    region: string
    endpoint: string
    bucket: string
  }

  listing: {
    publicDomain: string
    pageSize: number
    encodeKeys: boolean
    refreshCooldownMs: Milliseconds
    pageTitle: string
  }
}
