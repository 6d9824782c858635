import type { Logger, LoggerFactory } from "@ormlog/logger"
import { DEFAULT_CATEGORY, loggerCategories, namespaceFor } from "./categories"

/**
 * Category name → facility logger, built once.
 *
 * Every well-known category and the default category get their logger up
 * front; nothing is added afterwards.
 */
export class CategoryRegistry {
  private readonly loggers: ReadonlyMap<string, Logger>
  private readonly fallback: Logger

  constructor(factory: LoggerFactory) {
    const loggers = new Map<string, Logger>()

    for (const category of loggerCategories) {
      loggers.set(category, factory.getLogger(namespaceFor(category)))
    }

    this.fallback = factory.getLogger(namespaceFor(DEFAULT_CATEGORY))
    loggers.set(DEFAULT_CATEGORY, this.fallback)

    this.loggers = loggers
  }

  /**
   * Logger for `category`. Missing, blank and unregistered names get the
   * default category's logger. Names are matched exactly, without trimming.
   */
  resolve(category?: string | null): Logger {
    if (!category || category.trim() === "") return this.fallback

    return this.loggers.get(category) ?? this.fallback
  }

  categories(): string[] {
    return [...this.loggers.keys()]
  }
}
