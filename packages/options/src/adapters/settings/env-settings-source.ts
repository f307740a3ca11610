import { pickSettings, type SettingKey } from "../../core/settings/settings-schema"
import type { SettingsSource } from "../../ports/settings-source"

export type EnvSettingsSourceOptions = {
  /** Settings are read from `${prefix}LOG_LEVEL` and so on. */
  prefix?: string
  env?: Readonly<Record<string, string | undefined>>
}

/**
 * Reads the known setting keys from environment variables, so several
 * services sharing one environment can be told apart by prefix.
 */
export class EnvSettingsSource implements SettingsSource {
  readonly name: string

  constructor(private readonly options: EnvSettingsSourceOptions = {}) {
    this.name = options.prefix ? `env:${options.prefix}*` : "env"
  }

  async load(): Promise<Partial<Record<SettingKey, string>>> {
    return pickSettings(this.options.env ?? process.env, this.options.prefix)
  }
}
