export {
  createMemoryLoggerFactory,
  MemoryLogger,
  MemoryLoggerFactory,
  type MemoryLogRecord,
} from "./adapters/memory/memory-logger"
export {
  createPinoLoggerFactory,
  PinoLogger,
  PinoLoggerFactory,
  type PinoLoggerDeps,
} from "./adapters/pino/pino-logger"
export { resolveThreshold } from "./core/resolve-threshold"
export type { LogContext, LogContextPatch, LogEvent, LogMeta } from "./ports/log-context"
export {
  isLogThreshold,
  type LogLevelName,
  LogLevels,
  type LogThreshold,
  logLevelNames,
  logThresholdNames,
  THRESHOLD_SEVERITY,
} from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerFactory } from "./ports/logger-factory"
export type { LoggerOptions } from "./ports/logger-options"
