export const logLevelNames = ["trace", "debug", "info", "warn", "error"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Thresholds a logger can be configured with.
 *
 * `silent` disables every level for the logger it applies to.
 */
export const logThresholdNames = [...logLevelNames, "silent"] as const

export type LogThreshold = (typeof logThresholdNames)[number]

/**
 * Numeric log severity levels.
 *
 * These values define the ordering of log levels for comparison
 * and filtering (higher = more severe). They match pino's numbering.
 */
export const LogLevels = {
  /** Finest-grained diagnostic information. */
  Trace: 10,
  /** Debug-level information useful during development and investigation. */
  Debug: 20,
  /** High-level informational messages about normal operation. */
  Info: 30,
  /** Indications of potential issues or unexpected situations. */
  Warn: 40,
  /** Errors that indicate a failure in the current operation. */
  Error: 50,
  /** Above every level; nothing is emitted. */
  Silent: Number.POSITIVE_INFINITY,
} as const

export const THRESHOLD_SEVERITY: Readonly<Record<LogThreshold, number>> = {
  trace: LogLevels.Trace,
  debug: LogLevels.Debug,
  info: LogLevels.Info,
  warn: LogLevels.Warn,
  error: LogLevels.Error,
  silent: LogLevels.Silent,
}

export function isLogThreshold(value: unknown): value is LogThreshold {
  return (
    typeof value === "string" && (logThresholdNames as readonly string[]).includes(value)
  )
}
