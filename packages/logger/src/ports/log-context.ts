/**
 * Well-known fields carried by log entries.
 *
 * Options resolution runs on behalf of a tenant, so the tenant and the options
 * slot being resolved are first-class fields rather than free-form metadata.
 */
export type LogContext = {
  tenantId: string
  optionsType: string
  optionsName: string

  service: string
  module: string
  env: string
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  { err?: unknown } &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
