import {
  ConfigError,
  type ConfigSource,
  DotenvSource,
  EnvSource,
  JsonSource,
  loadConfig,
} from "@ormlog/config"
import type { LogThreshold } from "@ormlog/logger"
import type { SupplementFormatterOptions } from "../adapters/formatter/supplement-message-formatter"
import { type SessionLogEnvConfig, sessionLogEnvSchema } from "./schema"

export const ENV_PREFIX = "ORMLOG_"

export type SessionLogConfig = {
  logging: {
    level: LogThreshold
    levels: Readonly<Record<string, LogThreshold>>
    prettify: boolean
    serviceName?: string
  }

  formatting: SupplementFormatterOptions
}

export function mapEnvToConfig(env: SessionLogEnvConfig): SessionLogConfig {
  return {
    logging: {
      level: env.LEVEL,
      levels: env.LEVELS,
      prettify: env.PRETTY,
      ...(env.SERVICE_NAME !== undefined && { serviceName: env.SERVICE_NAME }),
    },
    formatting: {
      printDate: env.PRINT_TIMESTAMP,
      printThread: env.PRINT_THREAD,
      printSession: env.PRINT_SESSION,
      printConnection: env.PRINT_CONNECTION,
      printParameters: env.PRINT_PARAMETERS,
    },
  }
}

export type LoadSessionLogConfigOptions = {
  /** @default process.env */
  env?: Record<string, string | undefined>

  /** @default process.cwd() */
  cwd?: string

  /** JSON file with unprefixed keys; must exist when given. */
  file?: string
}

/**
 * Read `.env` (optional), then `file`, then the environment; later sources win.
 *
 * @throws ConfigError when a source cannot be read, a value is invalid or a
 * source sets a key no setting is named by (e.g. `ORMLOG_LEVLE`).
 */
export async function loadSessionLogConfig(
  opts: LoadSessionLogConfigOptions = {},
): Promise<SessionLogConfig> {
  const cwd = opts.cwd ?? process.cwd()

  const sources: ConfigSource[] = [
    new DotenvSource({ file: ".env", required: false, cwd, prefix: ENV_PREFIX }),
  ]

  if (opts.file !== undefined) {
    sources.push(new JsonSource({ file: opts.file, required: true, cwd }))
  }

  sources.push(new EnvSource({ env: opts.env ?? process.env, prefix: ENV_PREFIX }))

  const result = await loadConfig({ schema: sessionLogEnvSchema, sources })
  const unknownKeys = result.unknownKeys()

  if (unknownKeys.length > 0) {
    throw new ConfigError(`Unknown configuration keys: ${unknownKeys.join(", ")}`, {
      code: "config_invalid",
      context: { unknownKeys },
    })
  }

  return mapEnvToConfig(result.value)
}
