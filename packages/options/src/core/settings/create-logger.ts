import { createPinoLogger, type Logger, type PinoLoggerDeps } from "@tenantry/logger"
import type { MultiTenantSettings } from "./load-settings"

/**
 * Root logger for the options subsystem, bound to the configured service name.
 */
export function createLoggerFromSettings(
  settings: MultiTenantSettings,
  deps: PinoLoggerDeps = {},
): Logger {
  return createPinoLogger(
    deps,
    { level: settings.logging.level, prettify: settings.logging.prettify },
    { service: settings.logging.serviceName },
  )
}
