import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import type { ConfigSource } from "../source"

export type ConfigSourceHarness = {
  name: string
  expectedName: string

  /** Source that supplies `settings`, given as unprefixed session-log keys. */
  make: (cwd: string, settings: Readonly<Record<string, string>>) => Promise<ConfigSource>
}

export function describeConfigSourceContract(h: ConfigSourceHarness) {
  describe(`ConfigSource contract: ${h.name}`, () => {
    let cwd: string

    beforeEach(async () => {
      cwd = await fs.mkdtemp(path.join(os.tmpdir(), "ormlog-source-"))
    })

    afterEach(async () => {
      await fs.rm(cwd, { recursive: true, force: true })
    })

    it("names the origin it reads", async () => {
      const source = await h.make(cwd, {})

      expect(source.name).toBe(h.expectedName)
    })

    it("supplies settings under their unprefixed keys", async () => {
      const settings = { LEVEL: "debug", LEVELS: "persistence.logging.sql=trace" }
      const source = await h.make(cwd, settings)

      expect(await source.load()).toEqual(settings)
    })

    it("supplies nothing when no settings are present", async () => {
      const source = await h.make(cwd, {})

      expect(await source.load()).toEqual({})
    })

    it("returns a fresh object on every load", async () => {
      const source = await h.make(cwd, { PRINT_THREAD: "false" })

      const first = await source.load()
      first.PRINT_THREAD = "true"

      expect(await source.load()).toEqual({ PRINT_THREAD: "false" })
    })
  })
}
