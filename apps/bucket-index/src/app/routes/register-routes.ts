import type { Application } from "@bucket-index/server"
import { createListingModule } from "../../domains/listing"
import type { DomainServices } from "../services"

export type ApiModule = {
  name: string
  register: (app: Application) => void
}

export function registerRoutes(app: Application, services: DomainServices): void {
  const modules: ApiModule[] = [createListingModule({ listing: services.listing })]

  for (const m of modules) {
    m.register(app)
  }
}

export type RegisterRoutesFn = typeof registerRoutes
