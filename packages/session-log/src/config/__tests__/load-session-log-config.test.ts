import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { ConfigError } from "@ormlog/config"
import { loadSessionLogConfig, mapEnvToConfig } from "../load-session-log-config"

describe("loadSessionLogConfig", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "ormlog-session-log-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("falls back to defaults", async () => {
    const config = await loadSessionLogConfig({ env: {}, cwd })

    expect(config).toEqual({
      logging: { level: "info", levels: {}, prettify: false },
      formatting: {
        printDate: true,
        printThread: true,
        printSession: true,
        printConnection: true,
        printParameters: false,
      },
    })
  })

  it("reads prefixed environment variables", async () => {
    const config = await loadSessionLogConfig({
      cwd,
      env: {
        ORMLOG_LEVEL: "debug",
        ORMLOG_LEVELS: "persistence.logging.sql=trace, persistence.logging.cache=WARN",
        ORMLOG_PRETTY: "0",
        ORMLOG_SERVICE_NAME: "orders",
        ORMLOG_PRINT_PARAMETERS: "yes",
        ORMLOG_PRINT_THREAD: "off",
        PATH: "/usr/bin",
      },
    })

    expect(config.logging).toEqual({
      level: "debug",
      levels: { "persistence.logging.sql": "trace", "persistence.logging.cache": "warn" },
      prettify: false,
      serviceName: "orders",
    })
    expect(config.formatting.printParameters).toBe(true)
    expect(config.formatting.printThread).toBe(false)
  })

  it("layers .env, the JSON file and the environment", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "ORMLOG_LEVEL=warn\nORMLOG_PRINT_SESSION=false\nORMLOG_PRETTY=true",
    )
    await fs.writeFile(
      path.join(cwd, "ormlog.json"),
      JSON.stringify({
        LEVEL: "error",
        LEVELS: { "persistence.logging.sql": "debug" },
        PRETTY: false,
      }),
    )

    const config = await loadSessionLogConfig({
      cwd,
      file: "ormlog.json",
      env: { ORMLOG_LEVEL: "trace" },
    })

    expect(config.logging).toEqual({
      level: "trace",
      levels: { "persistence.logging.sql": "debug" },
      prettify: false,
    })
    expect(config.formatting.printSession).toBe(false)
  })

  it("rejects an unknown level", async () => {
    await expect(
      loadSessionLogConfig({ cwd, env: { ORMLOG_LEVEL: "verbose" } }),
    ).rejects.toMatchObject({ code: "config_invalid" })
  })

  it.each([
    ["a pair without a level", "persistence.logging.sql"],
    ["an unknown level", "persistence.logging.sql=loud"],
    ["an empty namespace", "=debug"],
  ])("rejects level overrides with %s", async (_, levels) => {
    await expect(
      loadSessionLogConfig({ cwd, env: { ORMLOG_LEVELS: levels } }),
    ).rejects.toBeInstanceOf(ConfigError)
  })

  it("rejects flags that are not booleans", async () => {
    await expect(
      loadSessionLogConfig({ cwd, env: { ORMLOG_PRINT_PARAMETERS: "maybe" } }),
    ).rejects.toMatchObject({ code: "config_invalid" })
  })

  it("rejects mistyped prefixed keys", async () => {
    const load = loadSessionLogConfig({ cwd, env: { ORMLOG_LEVLE: "debug", HOME: "/root" } })

    await expect(load).rejects.toThrow("Unknown configuration keys: LEVLE")
    await expect(load).rejects.toMatchObject({
      code: "config_invalid",
      context: { unknownKeys: ["LEVLE"] },
    })
  })

  it("rejects unknown keys in the JSON file", async () => {
    await fs.writeFile(
      path.join(cwd, "ormlog.json"),
      JSON.stringify({ LEVEL: "warn", PRINT_THRED: false }),
    )

    await expect(
      loadSessionLogConfig({ cwd, env: {}, file: "ormlog.json" }),
    ).rejects.toMatchObject({ context: { unknownKeys: ["PRINT_THRED"] } })
  })

  it("fails when the JSON file is missing", async () => {
    await expect(
      loadSessionLogConfig({ cwd, env: {}, file: "missing.json" }),
    ).rejects.toMatchObject({
      code: "config_source_failed",
      context: { source: "json:missing.json" },
    })
  })

  it("ignores empty entries in the override list", async () => {
    const config = await loadSessionLogConfig({
      cwd,
      env: { ORMLOG_LEVELS: "persistence.logging.ddl=silent,," },
    })

    expect(config.logging.levels).toEqual({ "persistence.logging.ddl": "silent" })
  })
})

describe("mapEnvToConfig", () => {
  it("maps flat keys to sections", () => {
    expect(
      mapEnvToConfig({
        LEVEL: "warn",
        LEVELS: {},
        PRETTY: true,
        PRINT_TIMESTAMP: false,
        PRINT_THREAD: true,
        PRINT_SESSION: false,
        PRINT_CONNECTION: true,
        PRINT_PARAMETERS: true,
      }),
    ).toEqual({
      logging: { level: "warn", levels: {}, prettify: true },
      formatting: {
        printDate: false,
        printThread: true,
        printSession: false,
        printConnection: true,
        printParameters: true,
      },
    })
  })
})
