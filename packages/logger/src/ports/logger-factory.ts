import type { LogContext } from "./log-context"
import type { Logger } from "./logger"

/**
 * Hands out named loggers.
 *
 * Names are dotted namespaces (`persistence.logging.sql`). Asking twice for the
 * same name returns the same logger.
 */
export interface LoggerFactory<TContext extends LogContext = LogContext> {
  getLogger(name: string): Logger<TContext>
}
