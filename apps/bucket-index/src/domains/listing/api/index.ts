import type { Application } from "@bucket-index/server"
import type { ListingServices } from "../composition"
import { getListingHandler } from "./get-listing.handler"

type ListingModuleDeps = {
  listing: ListingServices
}

export function createListingModule(deps: ListingModuleDeps) {
  return {
    name: "listing",
    register: (app: Application) => {
      app.get("/", getListingHandler({ cache: deps.listing.cache }))
    },
  }
}
