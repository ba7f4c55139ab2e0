import { ConfigError } from "@bucket-index/config"
import { TEST_ENV } from "../../../tests/test-harness"
import { loadAppConfig } from "../load-app-config"

const NO_DOTENV_DIR = "/nonexistent/bucket-index-config-test"

describe("loadAppConfig", () => {
  it("maps required variables and fills defaults", async () => {
    const config = await loadAppConfig(TEST_ENV, {}, NO_DOTENV_DIR)

    expect(config).toStrictEqual({
      app: { env: "test", serviceName: "bucket-index" },
      server: { host: "0.0.0.0", port: 8000, shutdownTimeoutMs: 10_000 },
      logging: { level: "info", prettify: false },
      s3: {
        accessKeyId: "test-key",
        secretAccessKey: "test-secret",
        region: "us-east-1",
        endpoint: "http://storage.test",
        bucket: "test-bucket",
      },
      listing: {
        publicDomain: "https://files.test/",
        pageSize: 1000,
        encodeKeys: false,
        refreshCooldownMs: 0,
        pageTitle: "Index of test-bucket",
      },
    })
  })

  it("coerces optional values", async () => {
    const config = await loadAppConfig(
      {
        ...TEST_ENV,
        PORT: "9090",
        LOG_PRETTY: "true",
        SERVER_TRUSTED_PROXIES: "1",
        LISTING_ENCODE_KEYS: "yes",
        LISTING_PAGE_SIZE: "250",
        LISTING_PAGE_TITLE: "Downloads",
      },
      {},
      NO_DOTENV_DIR,
    )

    expect(config.server.port).toBe(9090)
    expect(config.server.trustedProxies).toBe(1)
    expect(config.logging.prettify).toBe(true)
    expect(config.listing).toMatchObject({
      encodeKeys: true,
      pageSize: 250,
      pageTitle: "Downloads",
    })
  })

  it("lets overrides win over the environment", async () => {
    const config = await loadAppConfig(TEST_ENV, { BUCKET: "other" }, NO_DOTENV_DIR)

    expect(config.s3.bucket).toBe("other")
    expect(config.listing.pageTitle).toBe("Index of other")
  })

  it("names every missing variable, treating empty values as missing", async () => {
    const err = await loadAppConfig(
      { AWS_ACCESS_KEY_ID: "test-key", AWS_DEFAULT_REGION: "", BUCKET: "b" },
      {},
      NO_DOTENV_DIR,
    ).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ConfigError)
    if (!(err instanceof ConfigError)) return

    expect(err.code).toBe("config_invalid")
    expect(err.missing).toStrictEqual([
      "AWS_SECRET_ACCESS_KEY",
      "AWS_DEFAULT_REGION",
      "ENDPOINT_URL",
      "PUBLIC_DOMAIN",
    ])
    expect(err.message.split("\n")[0]).toBe(
      "Missing environment variable(s): AWS_SECRET_ACCESS_KEY, AWS_DEFAULT_REGION, ENDPOINT_URL, PUBLIC_DOMAIN",
    )
  })

  it("rejects an out-of-range page size", async () => {
    await expect(
      loadAppConfig({ ...TEST_ENV, LISTING_PAGE_SIZE: "5000" }, {}, NO_DOTENV_DIR),
    ).rejects.toThrow("Configuration validation failed")
  })
})
