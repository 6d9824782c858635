export type ConfigErrorCode = "config_invalid" | "config_source_failed"

/**
 * Structured metadata attached to configuration errors
 * (failing source, validation issues, unknown keys).
 */
export type ConfigErrorContext = Readonly<Record<string, unknown>>

export type ConfigErrorOptions = Readonly<{
  code: ConfigErrorCode
  context?: ConfigErrorContext
  cause?: unknown
}>

/** Raised when configuration cannot be loaded or does not validate. */
export class ConfigError extends Error {
  readonly code: ConfigErrorCode
  readonly context: ConfigErrorContext

  constructor(message: string, options: ConfigErrorOptions) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}
