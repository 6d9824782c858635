import type { SessionLogEntry } from "./session-log-entry"

export interface MessageFormatter {
  /** Assemble the final message text for an entry that is going to be emitted. */
  format(entry: SessionLogEntry): string
}
