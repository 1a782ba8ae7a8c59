import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.test"
   */
  file: string

  /**
   * `true` throws when the file is missing; `false` loads nothing instead.
   */
  required: boolean

  /** @default process.cwd() */
  cwd?: string

  /**
   * Only keys starting with this prefix are loaded, with the prefix removed,
   * the same way `EnvSource` filters.
   */
  prefix?: string
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    let content: string
    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && isMissingFile(err)) return {}
      throw err
    }

    const parsed = parse(content)
    const prefix = this.opts.prefix
    if (!prefix) return parsed

    const filtered: Record<string, string> = {}

    for (const [key, value] of Object.entries(parsed)) {
      if (key.startsWith(prefix)) filtered[key.slice(prefix.length)] = value
    }

    return filtered
  }
}
