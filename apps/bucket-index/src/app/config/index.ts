export { loadAppConfig, mapEnvToConfig } from "./load-app-config"
export type { AppConfig, AppEnv, EnvConfig } from "./schema"
