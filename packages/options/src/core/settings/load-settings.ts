import type { LogLevelName } from "@tenantry/logger"
import { z } from "zod"
import { EnvSettingsSource } from "../../adapters/settings/env-settings-source"
import type { SettingsSource } from "../../ports/settings-source"
import { SettingsError } from "../errors/errors"
import { type RawSettings, settingsSchema } from "./settings-schema"

export type MultiTenantSettings = {
  /**
   * Whether resolving outside a tenant scope fails (`true`) or falls back to
   * the un-multiplexed host instance (`false`).
   */
  requireTenant: boolean
  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }
}

export const defaultSettings: MultiTenantSettings = Object.freeze({
  requireTenant: true,
  logging: Object.freeze({ level: "info", prettify: false, serviceName: "tenantry" }),
})

export type LoadSettingsOptions = {
  env?: Record<string, string | undefined>
  /** Applied in order, later sources win. Defaults to the process environment. */
  sources?: readonly SettingsSource[]
}

export function mapSettings(raw: RawSettings): MultiTenantSettings {
  return {
    requireTenant: raw.TENANT_OPTIONS_REQUIRE_TENANT,
    logging: {
      level: raw.LOG_LEVEL,
      prettify: raw.LOG_PRETTY,
      serviceName: raw.SERVICE_NAME,
    },
  }
}

export async function loadSettings(
  options: LoadSettingsOptions = {},
): Promise<MultiTenantSettings> {
  const sources = options.sources ?? [new EnvSettingsSource({ env: options.env ?? process.env })]
  const merged: Record<string, unknown> = {}
  const origins = new Map<string, string>()

  for (const source of sources) {
    for (const [key, value] of Object.entries(await source.load())) {
      if (value === undefined) continue

      merged[key] = value
      origins.set(key, source.name)
    }
  }

  const result = settingsSchema.safeParse(merged)

  if (!result.success) {
    // Point at the source that supplied each rejected value.
    const rejected: Record<string, string> = {}

    for (const issue of result.error.issues) {
      const key = issue.path[0]
      const origin = typeof key === "string" ? origins.get(key) : undefined

      if (typeof key === "string" && origin !== undefined) rejected[key] = origin
    }

    throw new SettingsError(
      `Settings validation failed:\n${z.prettifyError(result.error)}`,
      { origins: rejected },
      result.error,
    )
  }

  return mapSettings(result.data)
}
