import { logLevelNames } from "@tenantry/logger"
import { z } from "zod"

const flag = z.union([z.boolean(), z.stringbool()])

export const settingsSchema = z.object({
  TENANT_OPTIONS_REQUIRE_TENANT: flag.default(true),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: flag.default(false),
  SERVICE_NAME: z.string().min(1).default("tenantry"),
})

export type RawSettings = z.infer<typeof settingsSchema>

export type SettingKey = keyof RawSettings

export const settingKeys: readonly SettingKey[] = settingsSchema.keyof().options

/**
 * The values of known setting keys, read as `${prefix}${key}`. Everything else
 * in `values` is left behind.
 */
export function pickSettings(
  values: Readonly<Record<string, string | undefined>>,
  prefix = "",
): Partial<Record<SettingKey, string>> {
  const picked: Partial<Record<SettingKey, string>> = {}

  for (const key of settingKeys) {
    const value = values[`${prefix}${key}`]

    if (value !== undefined) picked[key] = value
  }

  return picked
}
