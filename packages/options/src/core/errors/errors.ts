import type { OptionsName } from "../../ports/options-type"
import type { TenantId } from "../../ports/tenant-info"
import { type ErrorContext, OptionsError } from "./options-error"

/**
 * The options slot a resolution failure belongs to.
 */
export type ResolutionContext = Readonly<{
  optionsType: string
  optionsName: OptionsName
  tenantId: TenantId | null
}>

function describeSlot(ctx: ResolutionContext): string {
  const name = ctx.optionsName === "" ? "<default>" : `"${ctx.optionsName}"`
  const tenant = ctx.tenantId === null ? "host" : `tenant "${ctx.tenantId}"`

  return `${ctx.optionsType} ${name} for ${tenant}`
}

function causeMessage(cause: unknown): string {
  if (cause instanceof Error) return cause.message

  return typeof cause === "string" ? cause : "unknown error"
}

/**
 * A registration was rejected at startup.
 */
export class InvalidRegistrationError extends OptionsError<"invalid_registration"> {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, { code: "invalid_registration", context, isOperational: false })
  }
}

/**
 * Tenant isolation was required but no tenant is active.
 */
export class NoTenantContextError extends OptionsError<"no_tenant_context"> {
  constructor(context: Omit<ResolutionContext, "tenantId">) {
    super(`No tenant is active while resolving ${context.optionsType}`, {
      code: "no_tenant_context",
      context,
    })
  }
}

/**
 * The base pipeline failed to create or complete an instance.
 */
export class BaseConfigurationError extends OptionsError<"base_configuration_failure"> {
  constructor(context: ResolutionContext, cause: unknown) {
    super(`Failed to configure ${describeSlot(context)}: ${causeMessage(cause)}`, {
      code: "base_configuration_failure",
      context,
      cause,
    })
  }
}

/**
 * A tenant mutator threw. Later mutators in the chain did not run.
 */
export class MutationError extends OptionsError<"mutation_failure"> {
  constructor(context: ResolutionContext & { mutatorIndex: number }, cause: unknown) {
    super(
      `Tenant mutator #${context.mutatorIndex} failed for ${describeSlot(context)}: ${causeMessage(cause)}`,
      { code: "mutation_failure", context, cause, isRetryable: true },
    )
  }
}

/**
 * A tenant record cannot be used as a cache identity.
 */
export class InvalidTenantError extends OptionsError<"invalid_tenant"> {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, { code: "invalid_tenant", context, isOperational: false })
  }
}

/**
 * Settings could not be read or failed validation.
 */
export class SettingsError extends OptionsError<"invalid_settings"> {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, { code: "invalid_settings", context, cause, isOperational: false })
  }
}

/**
 * A configured instance did not satisfy its schema.
 */
export class OptionsValidationError extends OptionsError<"options_validation_failed"> {
  constructor(optionsType: string, optionsName: OptionsName, details: string) {
    super(`${optionsType} failed validation:\n${details}`, {
      code: "options_validation_failed",
      context: { optionsType, optionsName },
    })
  }
}

/**
 * Internal state no longer holds up. Indicates a bug, not bad input.
 */
export class InvariantViolationError extends OptionsError<"invariant_violation"> {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, { code: "invariant_violation", context, isOperational: false })
  }
}
