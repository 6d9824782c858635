import type { LogLevelName } from "@ormlog/logger"

/**
 * Level an entry is emitted at on the logging facility.
 *
 * `off` is never emitted and never asked about; it stands for
 * "no facility level corresponds to this severity".
 */
export type TargetLevel = LogLevelName | "off"
