import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"
import { type FileSourceOptions, readConfigFile } from "../file/read-config-file"
import { stripPrefix } from "../utils/strip-prefix"

export type DotenvSourceOptions = FileSourceOptions & {
  /** Only keys starting with this prefix are read; the prefix is stripped. */
  prefix?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await readConfigFile(this.opts)

    return content === undefined ? {} : stripPrefix(parse(content), this.opts.prefix)
  }
}
