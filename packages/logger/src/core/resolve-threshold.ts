import type { LogThreshold } from "../ports/log-level"
import type { LoggerOptions } from "../ports/logger-options"

const DEFAULT_THRESHOLD: LogThreshold = "info"

/**
 * Resolve the threshold for a logger name.
 *
 * Walks the name from most to least specific (`a.b.c`, `a.b`, `a`) and returns
 * the first configured override, falling back to the root `level`.
 */
export function resolveThreshold(
  name: string,
  opts: Partial<LoggerOptions> = {},
): LogThreshold {
  const levels = opts.levels ?? {}
  const segments = name.split(".")

  for (let end = segments.length; end > 0; end--) {
    const candidate = segments.slice(0, end).join(".")
    const override = Object.hasOwn(levels, candidate) ? levels[candidate] : undefined

    if (override) return override
  }

  return opts.level ?? DEFAULT_THRESHOLD
}
