import { type LoggerFactory, PinoLoggerFactory, type PinoLoggerDeps } from "@ormlog/logger"
import { SupplementMessageFormatter } from "../adapters/formatter/supplement-message-formatter"
import type { SessionLogConfig } from "../config/load-session-log-config"
import { SessionLogAdapter } from "../core/session-log-adapter"
import type { TimeSource } from "../ports/time-source"

export type CreateSessionLogAdapterDeps = {
  /** Used instead of a pino factory built from `config.logging`. */
  loggerFactory?: LoggerFactory
  pino?: PinoLoggerDeps
  timeSource?: TimeSource
}

export function createSessionLogAdapter(
  config: SessionLogConfig,
  deps: CreateSessionLogAdapterDeps = {},
): SessionLogAdapter {
  const { logging, formatting } = config

  const loggerFactory =
    deps.loggerFactory ??
    new PinoLoggerFactory(
      deps.pino ?? {},
      { level: logging.level, levels: logging.levels, prettify: logging.prettify },
      logging.serviceName === undefined ? {} : { service: logging.serviceName },
    )

  const formatter = new SupplementMessageFormatter(
    formatting,
    deps.timeSource ? { timeSource: deps.timeSource } : {},
  )

  return new SessionLogAdapter({ loggerFactory, formatter })
}
