export { createListingModule } from "./api"
export { createListingServices, type ListingServices } from "./composition"
export { ListingError, type ListingErrorCode } from "./model/listing.errors"
export {
  type Entry,
  type Group,
  type RefreshStatus,
  type Snapshot,
  UNGROUPED,
} from "./model/listing.model"
export { ListingCache, SNAPSHOT_EXPIRATION_MS } from "./services/listing-cache"
