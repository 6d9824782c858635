import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import { resolveThreshold } from "../../core/resolve-threshold"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import { isLogThreshold, type LogLevelName, type LogThreshold } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerFactory } from "../../ports/logger-factory"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /**
   * Base pino logger to create children from (serializers, destination, level).
   * Children keep the base level unless `level` or a `levels` override
   * applies to their name.
   */
  base?: PinoLoggerBase

  /**
   * Optional destination stream for pino output.
   * Ignored when `prettify` is on, since pino-pretty owns the output then.
   */
  destination?: DestinationStream
}

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  constructor(
    readonly name: string,
    protected readonly logger: PinoLoggerBase,
  ) {}

  isLevelEnabled(level: LogLevelName): boolean {
    return this.logger.isLevelEnabled(level)
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.logger.trace(meta ?? {}, message)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.logger.debug(meta ?? {}, message)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.logger.info(meta ?? {}, message)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.logger.warn(meta ?? {}, message)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.logger.error(meta ?? {}, message)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>(this.name, this.logger.child(context))
  }
}

export class PinoLoggerFactory<TContext extends LogContext = LogContext>
  implements LoggerFactory<TContext>
{
  protected readonly root: PinoLoggerBase
  protected readonly opts: Partial<LoggerOptions>
  private readonly loggers = new Map<string, PinoLogger<TContext>>()

  constructor(
    protected readonly deps: Readonly<PinoLoggerDeps> = {},
    opts: Partial<LoggerOptions> = {},
    context: LogContextPatch = {},
  ) {
    this.opts = opts
    this.root = this.init(context)
  }

  private init(context: LogContextPatch): PinoLoggerBase {
    if (this.deps.base) return this.deps.base.child(context)

    const pinoOpts: PinoOptions = {
      level: this.opts.level ?? "info",
      serializers: { err: errWithCause },
      ...(this.opts.prettify && {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "hostname",
          },
        },
      }),
    }

    const base =
      this.deps.destination && !this.opts.prettify
        ? pino(pinoOpts, this.deps.destination)
        : pino(pinoOpts)

    return base.child(context)
  }

  getLogger(name: string): Logger<TContext> {
    const existing = this.loggers.get(name)
    if (existing) return existing

    const logger = new PinoLogger<TContext>(
      name,
      this.root.child({ logger: name }, { level: this.thresholdFor(name) }),
    )

    this.loggers.set(name, logger)

    return logger
  }

  private thresholdFor(name: string): LogThreshold {
    const inherited = this.root.level

    return resolveThreshold(name, {
      levels: this.opts.levels,
      level: this.opts.level ?? (isLogThreshold(inherited) ? inherited : undefined),
    })
  }
}

export function createPinoLoggerFactory<TContext extends LogContext = LogContext>(
  deps: PinoLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
  context: LogContextPatch = {},
): LoggerFactory<TContext> {
  return new PinoLoggerFactory<TContext>(deps, opts, context)
}
