export {
  DEFAULT_FORMATTER_OPTIONS,
  type SupplementFormatterDeps,
  type SupplementFormatterOptions,
  SupplementMessageFormatter,
} from "./adapters/formatter/supplement-message-formatter"
export {
  createSessionLogAdapter,
  type CreateSessionLogAdapterDeps,
} from "./composition/create-session-log-adapter"
export {
  ENV_PREFIX,
  type LoadSessionLogConfigOptions,
  loadSessionLogConfig,
  mapEnvToConfig,
  type SessionLogConfig,
} from "./config/load-session-log-config"
export { type SessionLogEnvConfig, sessionLogEnvSchema } from "./config/schema"
export {
  DEFAULT_CATEGORY,
  type LoggerCategory,
  loggerCategories,
  namespaceFor,
  ROOT_NAMESPACE,
} from "./core/categories"
export { CategoryRegistry } from "./core/category-registry"
export { SessionLogAdapter, type SessionLogAdapterDeps } from "./core/session-log-adapter"
export { SeverityTranslator } from "./core/severity-translator"
export type { MessageFormatter } from "./ports/message-formatter"
export type { SessionLog } from "./ports/session-log"
export type { ConnectionRef, SessionLogEntry, SessionRef } from "./ports/session-log-entry"
export { type SessionLogLevel, SessionLogLevels } from "./ports/session-log-level"
export type { TargetLevel } from "./ports/target-level"
export { systemTimeSource, type TimeSource } from "./ports/time-source"
