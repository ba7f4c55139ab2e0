import {
  createS3Client,
  createS3Storage,
  type S3Client,
  type StoragePort,
} from "@bucket-index/storage"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"

export type InfraServices = {
  s3Client: S3Client
  storage: StoragePort
}

export function createInfraServices(config: AppConfig, core: CoreServices): InfraServices {
  const s3Client = createS3Client({
    region: config.s3.region,
    endpoint: config.s3.endpoint,
    accessKeyId: config.s3.accessKeyId,
    secretAccessKey: config.s3.secretAccessKey,
  })

  const storage = createS3Storage({ client: s3Client, clock: core.clock })

  return { s3Client, storage }
}
