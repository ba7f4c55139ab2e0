import {
  createListingServices,
  type ListingServices,
} from "../../domains/listing/composition"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"
import type { InfraServices } from "./infra"

export type DomainServices = {
  listing: ListingServices
}

export type AppServices = {
  core: CoreServices
  infra: InfraServices
  domains: DomainServices
}

export function createDomainServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraServices,
): DomainServices {
  return {
    listing: createListingServices(config, core, infra),
  }
}
