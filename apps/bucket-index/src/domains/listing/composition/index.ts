import { createSingleflight } from "@bucket-index/singleflight"
import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { InfraServices } from "../../../app/services/infra"
import type { Snapshot } from "../model/listing.model"
import { BucketLister } from "../services/bucket-lister"
import { ListingCache } from "../services/listing-cache"
import { SnapshotRenderer } from "../services/snapshot-renderer"

export type ListingServices = {
  lister: BucketLister
  renderer: SnapshotRenderer
  cache: ListingCache
}

export function createListingServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraServices,
): ListingServices {
  const lister = new BucketLister(
    { storage: infra.storage },
    {
      bucket: config.s3.bucket,
      publicDomain: config.listing.publicDomain,
      pageSize: config.listing.pageSize,
      encodeKeys: config.listing.encodeKeys,
    },
  )

  const renderer = new SnapshotRenderer({ title: config.listing.pageTitle })

  const cache = new ListingCache(
    {
      lister,
      renderer,
      clock: core.clock,
      logger: core.logger.child({ module: "listing" }),
      singleflight: createSingleflight<Snapshot>(),
    },
    { refreshCooldownMs: config.listing.refreshCooldownMs },
  )

  return { lister, renderer, cache }
}
