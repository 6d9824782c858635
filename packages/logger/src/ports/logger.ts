import type { LogContext, LogContextPatch, LogMeta } from "./log-context"
import type { LogLevelName } from "./log-level"

export interface Logger<TContext extends LogContext = LogContext> {
  /** Namespaced name this logger was obtained under. */
  readonly name: string

  /**
   * Whether an entry at `level` would currently be emitted.
   *
   * @remarks
   * Callers use this to skip building messages that would be discarded.
   * The answer reflects the facility's configuration at the time of the call.
   */
  isLevelEnabled(level: LogLevelName): boolean

  trace(message: string, meta?: LogMeta<TContext>): void
  debug(message: string, meta?: LogMeta<TContext>): void
  info(message: string, meta?: LogMeta<TContext>): void
  warn(message: string, meta?: LogMeta<TContext>): void
  error(message: string, meta?: LogMeta<TContext>): void

  /**
   * Creates a child logger that inherits the parent context and adds
   * additional contextual fields.
   *
   * The child keeps the parent's name and level.
   */
  child<U extends LogContextPatch>(context: U): Logger<TContext & U>
}
