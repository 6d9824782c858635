import type { SessionLogEntry } from "./session-log-entry"

/**
 * What the host framework talks to.
 *
 * Both operations are synchronous and never throw for unknown categories
 * or severities.
 */
export interface SessionLog {
  /**
   * Whether an entry with this severity and category would be emitted.
   * Omitting the category is the same as passing `"default"`.
   */
  shouldLog(level: number, category?: string | null): boolean

  log(entry: SessionLogEntry): void
}
