export type OptionsErrorCode =
  | "invalid_registration"
  | "no_tenant_context"
  | "base_configuration_failure"
  | "mutation_failure"
  | "invalid_tenant"
  | "invalid_settings"
  | "options_validation_failed"
  | "invariant_violation"

/**
 * Structured metadata attached to an error (options slot, tenant, ...).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export type OptionsErrorOptions<C extends OptionsErrorCode = OptionsErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

/**
 * JSON-safe error shape for logs and transport.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>

export class OptionsError<C extends OptionsErrorCode = OptionsErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext
  /** `true` when the same call may succeed if repeated. */
  readonly isRetryable: boolean
  /**
   * `true` for expected runtime failures, `false` for programmer errors such
   * as an invalid registration.
   */
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: OptionsErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any thrown value, following `cause` links.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof OptionsError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}

/**
 * Type guard for errors raised by this package, optionally narrowed by code.
 *
 * @example
 * ```ts
 * catch (err) {
 *   if (isOptionsError(err, "no_tenant_context")) return reply.status(400)
 *   throw err
 * }
 * ```
 */
export function isOptionsError<C extends OptionsErrorCode>(
  err: unknown,
  code?: C,
): err is OptionsError<C> {
  if (!(err instanceof OptionsError)) return false

  return code === undefined || err.code === code
}
