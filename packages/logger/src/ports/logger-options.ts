import type { LogThreshold } from "./log-level"

/**
 * Configuration options for a logger factory.
 *
 * @remarks
 * These options define *policy*, not behavior:
 * - which log levels are emitted, per logger name
 * - how logs are rendered for humans vs machines
 *
 * Concrete adapters (pino, memory) must honor these options,
 * but are free to choose how they are implemented internally.
 */
export type LoggerOptions = {
  /**
   * Minimum log level for loggers without a more specific override.
   *
   * Example: "info" will suppress "trace" and "debug" logs.
   */
  level: LogThreshold

  /**
   * Per-namespace overrides keyed by dotted logger name.
   *
   * The longest configured prefix of a logger's name wins, matched on whole
   * segments: `persistence.logging` applies to `persistence.logging.sql` but
   * not to `persistence.loggingx`.
   */
  levels?: Readonly<Record<string, LogThreshold>>

  /**
   * Whether to pretty-print log output for human readability.
   *
   * @remarks
   * - Intended for local development and debugging.
   * - Should be disabled in production where structured (JSON) logs
   *   are preferred for ingestion by log processors.
   */
  prettify?: boolean
}
