import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { ConfigSource } from "./config-source"

export type DotenvSourceOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   */
  file: string

  /**
   * When `false`, a missing file yields no values instead of an error.
   */
  required: boolean

  /**
   * Only variables starting with this prefix are kept, with the prefix removed.
   */
  prefix?: string

  /**
   * @default process.cwd()
   */
  cwd?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)
    let content: string

    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && isNotFound(err)) return {}
      throw err
    }

    const parsed = parse(content)
    const { prefix } = this.opts
    if (!prefix) return parsed

    const filtered: Record<string, string> = {}

    for (const [key, value] of Object.entries(parsed)) {
      if (key.startsWith(prefix)) filtered[key.slice(prefix.length)] = value
    }

    return filtered
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
