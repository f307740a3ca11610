import type { LogContext, LogContextPatch, LogMeta } from "./log-context"

export interface Logger<TContext extends LogContext = LogContext> {
  trace(message: string, meta?: LogMeta<TContext>): void
  debug(message: string, meta?: LogMeta<TContext>): void
  info(message: string, meta?: LogMeta<TContext>): void
  warn(message: string, meta?: LogMeta<TContext>): void
  error(message: string, meta?: LogMeta<TContext>): void
  fatal(message: string, meta?: LogMeta<TContext>): void

  /**
   * Creates a child logger whose entries carry the parent context merged with
   * `context` (child wins on conflicts). The parent is left untouched.
   *
   * Used to scope logs to a component or a tenant, e.g.
   * `logger.child({ module: "options-resolver", tenantId })`.
   */
  child<U extends LogContextPatch>(context: U): Logger<TContext & U>
}
