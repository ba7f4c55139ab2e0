import type { LifecycleHook } from "@bucket-index/server"
import type { AppServices } from "../services"

export function createStartHooks(services: AppServices): LifecycleHook[] {
  return [
    {
      name: "listing:snapshot",
      fn: async () => {
        await services.domains.listing.cache.initialize()
      },
    },
  ]
}

export type CreateStartHooksFn = typeof createStartHooks
