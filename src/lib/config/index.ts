export { DotenvSource, type DotenvSourceOptions } from "./dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./env-source"
export { type LoadConfigOptions, loadConfig } from "./load-config"
export type { ConfigSource } from "./source"
