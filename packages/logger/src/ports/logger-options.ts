import type { LogLevelName } from "./log-level"

/**
 * Logging policy shared by every adapter.
 */
export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local development.
   * Leave off in production where JSON lines are ingested.
   */
  prettify?: boolean

  /**
   * Object paths whose values are replaced before an entry is written,
   * e.g. `["tenant.connectionString"]`.
   */
  redact?: readonly string[]
}
