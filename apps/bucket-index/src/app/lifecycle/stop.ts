import type { LifecycleHook } from "@bucket-index/server"
import type { AppServices } from "../services"

export function createStopHooks(services: AppServices): LifecycleHook[] {
  return [
    {
      name: "stop:s3-client",
      fn: async () => {
        services.infra.s3Client.destroy()
      },
    },
  ]
}

export type CreateStopHooksFn = typeof createStopHooks
