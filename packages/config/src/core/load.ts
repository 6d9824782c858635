import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigError } from "./config-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  sources?: ConfigSource[]
}

/**
 * Merge `sources` in order (later wins) and validate against `schema`.
 *
 * @throws ConfigError `config_source_failed` when a source cannot be read,
 * `config_invalid` when the merged values do not validate.
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await loadSource(source)

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) merged[key] = value
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigError(
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      {
        code: "config_invalid",
        context: {
          issues: result.error.issues.map((issue) => ({
            path: issue.path.map(String).join("."),
            message: issue.message,
          })),
        },
      },
    )
  }

  return new Config<T>(result.data, new Set(Object.keys(merged)))
}

async function loadSource(source: ConfigSource): Promise<Record<string, unknown>> {
  try {
    return await source.load()
  } catch (err) {
    throw new ConfigError(`Failed to load configuration from ${source.name}`, {
      code: "config_source_failed",
      context: { source: source.name },
      cause: err,
    })
  }
}
