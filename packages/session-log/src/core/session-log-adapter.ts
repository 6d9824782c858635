import type { Logger, LogLevelName, LoggerFactory, LogMeta } from "@ormlog/logger"
import { SupplementMessageFormatter } from "../adapters/formatter/supplement-message-formatter"
import type { MessageFormatter } from "../ports/message-formatter"
import type { SessionLog } from "../ports/session-log"
import type { SessionLogEntry } from "../ports/session-log-entry"
import { SessionLogLevels } from "../ports/session-log-level"
import { DEFAULT_CATEGORY } from "./categories"
import { CategoryRegistry } from "./category-registry"
import { SeverityTranslator } from "./severity-translator"

export type SessionLogAdapterDeps = {
  loggerFactory: LoggerFactory

  /**
   * Builds message text for entries that pass the enablement check.
   * @default SupplementMessageFormatter with default options
   */
  formatter?: MessageFormatter
}

type Emit = (logger: Logger, message: string, meta?: LogMeta) => void

const EMITTERS: Readonly<Record<LogLevelName, Emit>> = {
  trace: (logger, message, meta) => logger.trace(message, meta),
  debug: (logger, message, meta) => logger.debug(message, meta),
  info: (logger, message, meta) => logger.info(message, meta),
  warn: (logger, message, meta) => logger.warn(message, meta),
  error: (logger, message, meta) => logger.error(message, meta),
}

type Target = {
  logger: Logger
  level: LogLevelName
}

/**
 * Routes host session log entries to facility loggers.
 *
 * The facility decides whether a level is enabled; this class only picks the
 * logger and the level. Message text is built only for entries that will be
 * emitted.
 */
export class SessionLogAdapter implements SessionLog {
  private readonly registry: CategoryRegistry
  private readonly translator = new SeverityTranslator()
  private readonly formatter: MessageFormatter

  constructor(deps: SessionLogAdapterDeps) {
    this.registry = new CategoryRegistry(deps.loggerFactory)
    this.formatter = deps.formatter ?? new SupplementMessageFormatter()
  }

  shouldLog(level: number, category: string | null = DEFAULT_CATEGORY): boolean {
    return this.enabledTarget(level, category) !== undefined
  }

  log(entry: SessionLogEntry): void {
    const target = this.enabledTarget(entry.level, entry.category)
    if (!target) return

    const message = this.formatter.format(entry)
    const meta = entry.error === undefined ? undefined : { err: entry.error }

    EMITTERS[target.level](target.logger, message, meta)
  }

  logMessage(
    level: number,
    message: string,
    parameters?: readonly unknown[],
    category?: string | null,
  ): void {
    this.log({ level, category, message, parameters })
  }

  severe(message: string, parameters?: readonly unknown[], category?: string | null): void {
    this.logMessage(SessionLogLevels.Severe, message, parameters, category)
  }

  warning(message: string, parameters?: readonly unknown[], category?: string | null): void {
    this.logMessage(SessionLogLevels.Warning, message, parameters, category)
  }

  info(message: string, parameters?: readonly unknown[], category?: string | null): void {
    this.logMessage(SessionLogLevels.Info, message, parameters, category)
  }

  config(message: string, parameters?: readonly unknown[], category?: string | null): void {
    this.logMessage(SessionLogLevels.Config, message, parameters, category)
  }

  fine(message: string, parameters?: readonly unknown[], category?: string | null): void {
    this.logMessage(SessionLogLevels.Fine, message, parameters, category)
  }

  finer(message: string, parameters?: readonly unknown[], category?: string | null): void {
    this.logMessage(SessionLogLevels.Finer, message, parameters, category)
  }

  finest(message: string, parameters?: readonly unknown[], category?: string | null): void {
    this.logMessage(SessionLogLevels.Finest, message, parameters, category)
  }

  /** Log a caught error at FINER, with the error attached. */
  throwing(error: unknown, category?: string | null): void {
    this.log({
      level: SessionLogLevels.Finer,
      category,
      message: error instanceof Error ? error.message : String(error),
      error,
    })
  }

  categories(): string[] {
    return this.registry.categories()
  }

  private enabledTarget(level: number, category?: string | null): Target | undefined {
    const target = this.translator.translate(level)
    if (target === "off") return undefined

    const logger = this.registry.resolve(category)

    return logger.isLevelEnabled(target) ? { logger, level: target } : undefined
  }
}
