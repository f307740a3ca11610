import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { SettingsError } from "../../core/errors/errors"
import { pickSettings, type SettingKey } from "../../core/settings/settings-schema"
import type { SettingsSource } from "../../ports/settings-source"

export type DotenvSettingsSourceOptions = {
  file: string
  /** A missing optional file contributes no settings. */
  required: boolean
  prefix?: string
  /** @default process.cwd() */
  cwd?: string
}

/**
 * Known setting keys from a .env file. The file is parsed, never loaded into
 * `process.env`.
 */
export class DotenvSettingsSource implements SettingsSource {
  readonly name: string
  private readonly filePath: string

  constructor(private readonly opts: DotenvSettingsSourceOptions) {
    this.filePath = path.resolve(opts.cwd ?? process.cwd(), opts.file)
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Partial<Record<SettingKey, string>>> {
    let contents: string

    try {
      contents = await fs.readFile(this.filePath, "utf-8")
    } catch (err) {
      if (!isMissingFile(err)) throw err
      if (!this.opts.required) return {}

      throw new SettingsError(`Required settings file ${this.opts.file} was not found`, {
        source: this.name,
        path: this.filePath,
      }, err)
    }

    return pickSettings(parse(contents), this.opts.prefix)
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
