export { loadAppConfig, mapEnvToConfig } from "./load-app-config"
export type { AppConfig, EnvConfig, JobStoreKind } from "./schema"
