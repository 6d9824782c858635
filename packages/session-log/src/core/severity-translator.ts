import type { LogLevelName } from "@ormlog/logger"
import { SessionLogLevels } from "../ports/session-log-level"
import type { TargetLevel } from "../ports/target-level"

const SEVERITY_TABLE: ReadonlyArray<readonly [number, LogLevelName]> = [
  [SessionLogLevels.All, "trace"],
  [SessionLogLevels.Finest, "trace"],
  [SessionLogLevels.Finer, "trace"],
  [SessionLogLevels.Fine, "debug"],
  [SessionLogLevels.Config, "info"],
  [SessionLogLevels.Info, "info"],
  [SessionLogLevels.Warning, "warn"],
  [SessionLogLevels.Severe, "error"],
]

export class SeverityTranslator {
  private readonly levels: ReadonlyMap<number, LogLevelName> = new Map(SEVERITY_TABLE)

  /** Facility level for a host severity code; `off` for anything unmapped. */
  translate(level: number): TargetLevel {
    return this.levels.get(level) ?? "off"
  }
}
