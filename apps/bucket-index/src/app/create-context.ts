import { fileURLToPath } from "node:url"
import { type AppConfig, loadAppConfig } from "./config"
import { type CreateStartHooksFn, createStartHooks } from "./lifecycle/start"
import { type CreateStopHooksFn, createStopHooks } from "./lifecycle/stop"
import { type RegisterRoutesFn, registerRoutes } from "./routes/register-routes"
import { type AppServices, createDomainServices } from "./services"
import { type CoreServices, createCoreServices } from "./services/core"
import { createInfraServices, type InfraServices } from "./services/infra"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv

  /** Raw variables applied over the environment, before validation. */
  configOverrides?: Record<string, string>

  /** Directory holding `.env.<APP_ENV>`. @default the app package root */
  cwd?: string

  coreOverrides?: Partial<CoreServices>
  infraOverrides?: Partial<InfraServices>
}

export type AppContext = {
  config: AppConfig
  services: AppServices
  registerRoutes: RegisterRoutesFn
  createStartHooks: CreateStartHooksFn
  createStopHooks: CreateStopHooksFn
}

const packageRoot = fileURLToPath(new URL("../..", import.meta.url))

export async function createAppContext(
  options: AppContextOptions = {},
): Promise<AppContext> {
  const config = await loadAppConfig(
    options.env ?? process.env,
    options.configOverrides,
    options.cwd ?? packageRoot,
  )

  const core = { ...createCoreServices(config), ...options.coreOverrides }
  const infra = { ...createInfraServices(config, core), ...options.infraOverrides }
  const domains = createDomainServices(config, core, infra)

  return {
    config,
    services: { core, infra, domains },
    registerRoutes,
    createStartHooks,
    createStopHooks,
  }
}
