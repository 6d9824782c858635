export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export type { FileSourceOptions } from "./adapters/file/read-config-file"
export { JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { Config } from "./core/config"
export {
  ConfigError,
  type ConfigErrorCode,
  type ConfigErrorContext,
  type ConfigErrorOptions,
} from "./core/config-error"
export { type LoadConfigOptions, loadConfig } from "./core/load"
export type { IConfig } from "./ports/config"
export type { ConfigSource } from "./ports/source"
