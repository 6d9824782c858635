/**
 * Validated configuration.
 *
 * @typeParam T - The shape of the configuration object, typically inferred from a Zod schema.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ LEVEL: z.enum(logThresholdNames).default("info") }),
 *   sources: [new EnvSource({ prefix: "ORMLOG_" })],
 * })
 *
 * config.value.LEVEL     // "debug"
 * config.unknownKeys()   // ["LEVLE"] for ORMLOG_LEVLE=debug
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /** Keys some source provided that the schema does not define. */
  unknownKeys(): string[]
}
