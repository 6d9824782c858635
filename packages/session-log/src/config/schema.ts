import { type LogThreshold, isLogThreshold, logThresholdNames } from "@ormlog/logger"
import { z } from "zod"

const threshold = z.enum(logThresholdNames)

const flag = (fallback: boolean) => z.union([z.boolean(), z.stringbool()]).default(fallback)

/** `persistence.logging.sql=debug, persistence.logging.cache=warn` */
const levelOverridesString = z.string().transform((raw, ctx) => {
  const levels: Record<string, LogThreshold> = {}

  for (const pair of raw.split(",")) {
    if (pair.trim() === "") continue

    const eq = pair.indexOf("=")
    const name = eq === -1 ? "" : pair.slice(0, eq).trim()
    const level = eq === -1 ? "" : pair.slice(eq + 1).trim().toLowerCase()

    if (name === "" || !isLogThreshold(level)) {
      ctx.issues.push({
        code: "custom",
        message: `Invalid level override "${pair.trim()}", expected <namespace>=<${logThresholdNames.join("|")}>`,
        input: raw,
      })
      return z.NEVER
    }

    levels[name] = level
  }

  return levels
})

export const sessionLogEnvSchema = z.object({
  LEVEL: threshold.default("info"),
  LEVELS: z.union([levelOverridesString, z.record(z.string(), threshold)]).default({}),
  PRETTY: flag(false),
  SERVICE_NAME: z.string().optional(),

  PRINT_TIMESTAMP: flag(true),
  PRINT_THREAD: flag(true),
  PRINT_SESSION: flag(true),
  PRINT_CONNECTION: flag(true),
  PRINT_PARAMETERS: flag(false),
})

export type SessionLogEnvConfig = z.infer<typeof sessionLogEnvSchema>
