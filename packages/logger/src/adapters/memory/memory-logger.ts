import { resolveThreshold } from "../../core/resolve-threshold"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import { type LogLevelName, type LogThreshold, THRESHOLD_SEVERITY } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerFactory } from "../../ports/logger-factory"
import type { LoggerOptions } from "../../ports/logger-options"

export type MemoryLogRecord = {
  logger: string
  level: LogLevelName
  message: string
  meta: Record<string, unknown>
}

type MemorySink = {
  thresholdFor(name: string): LogThreshold
  append(record: MemoryLogRecord): void
}

export class MemoryLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  constructor(
    readonly name: string,
    private readonly sink: MemorySink,
    private readonly context: LogContextPatch = {},
  ) {}

  isLevelEnabled(level: LogLevelName): boolean {
    return THRESHOLD_SEVERITY[level] >= THRESHOLD_SEVERITY[this.sink.thresholdFor(this.name)]
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.write("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.write("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.write("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.write("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.write("error", message, meta)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new MemoryLogger<TContext & U>(this.name, this.sink, {
      ...this.context,
      ...stripUndefined(context),
    })
  }

  private write(level: LogLevelName, message: string, meta?: LogMeta<TContext>) {
    if (!this.isLevelEnabled(level)) return

    this.sink.append({
      logger: this.name,
      level,
      message,
      meta: { ...this.context, ...(meta ? stripUndefined(meta) : {}) },
    })
  }
}

/**
 * In-process logging facility that keeps every emitted entry in order.
 *
 * Thresholds are read on every call, so `setLevel` takes effect for loggers
 * that were handed out before it.
 */
export class MemoryLoggerFactory<TContext extends LogContext = LogContext>
  implements LoggerFactory<TContext>
{
  private readonly records: MemoryLogRecord[] = []
  private readonly loggers = new Map<string, MemoryLogger<TContext>>()
  private levels: Record<string, LogThreshold>

  constructor(private readonly opts: Partial<LoggerOptions> = {}) {
    this.levels = { ...opts.levels }
  }

  getLogger(name: string): Logger<TContext> {
    const existing = this.loggers.get(name)
    if (existing) return existing

    const logger = new MemoryLogger<TContext>(name, {
      thresholdFor: (loggerName) => this.thresholdFor(loggerName),
      append: (record) => this.records.push(record),
    })

    this.loggers.set(name, logger)

    return logger
  }

  /** Override the threshold for `name` and every logger below it. */
  setLevel(name: string, threshold: LogThreshold): void {
    this.levels = { ...this.levels, [name]: threshold }
  }

  thresholdFor(name: string): LogThreshold {
    return resolveThreshold(name, { level: this.opts.level, levels: this.levels })
  }

  read(): MemoryLogRecord[] {
    return [...this.records]
  }

  clear(): void {
    this.records.length = 0
  }
}

function stripUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [k, v] of Object.entries(obj)) {
    if (v !== undefined) out[k] = v
  }
  return out
}

export function createMemoryLoggerFactory<TContext extends LogContext = LogContext>(
  opts: Partial<LoggerOptions> = {},
): MemoryLoggerFactory<TContext> {
  return new MemoryLoggerFactory<TContext>(opts)
}
