import type { ConfigSource } from "../../ports/source"
import { type FileSourceOptions, readConfigFile } from "../file/read-config-file"

export type JsonSourceOptions = FileSourceOptions

export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await readConfigFile(this.opts)
    if (content === undefined) return {}

    const parsed: unknown = JSON.parse(content)

    if (!isPlainObject(parsed)) {
      throw new TypeError(`${this.opts.file} must contain a JSON object`)
    }

    return parsed
  }
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v)
}
