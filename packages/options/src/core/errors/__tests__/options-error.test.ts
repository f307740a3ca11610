import {
  BaseConfigurationError,
  InvalidRegistrationError,
  MutationError,
  NoTenantContextError,
} from "../errors"
import { isOptionsError, OptionsError, serializeError } from "../options-error"

describe("OptionsError", () => {
  it("captures code, frozen context and defaults", () => {
    const error = new OptionsError("boom", {
      code: "invariant_violation",
      context: { optionsType: "BillingOptions" },
    })

    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe("OptionsError")
    expect(error.code).toBe("invariant_violation")
    expect(error.context).toEqual({ optionsType: "BillingOptions" })
    expect(Object.isFrozen(error.context)).toBe(true)
    expect(error.isRetryable).toBe(false)
    expect(error.isOperational).toBe(true)
    expect(error.timestamp).toBeInstanceOf(Date)
  })

  it("names subclasses after themselves", () => {
    const error = new InvalidRegistrationError("bad", { optionsType: "BillingOptions" })

    expect(error.name).toBe("InvalidRegistrationError")
    expect(error.isOperational).toBe(false)
  })
})

describe("resolution errors", () => {
  it("describes the host slot and default name", () => {
    const error = new BaseConfigurationError(
      { optionsType: "BillingOptions", optionsName: "", tenantId: null },
      new Error("missing section"),
    )

    expect(error.message).toBe("Failed to configure BillingOptions <default> for host: missing section")
    expect(error.cause).toBeInstanceOf(Error)
  })

  it("names the failing mutator and marks it retryable", () => {
    const error = new MutationError(
      { optionsType: "BillingOptions", optionsName: "annual", tenantId: "tenant-a", mutatorIndex: 2 },
      "plan lookup failed",
    )

    expect(error.message).toBe(
      'Tenant mutator #2 failed for BillingOptions "annual" for tenant "tenant-a": plan lookup failed',
    )
    expect(error.isRetryable).toBe(true)
    expect(error.context).toEqual({
      optionsType: "BillingOptions",
      optionsName: "annual",
      tenantId: "tenant-a",
      mutatorIndex: 2,
    })
  })

  it("reports missing tenant context", () => {
    const error = new NoTenantContextError({ optionsType: "LoggingOptions", optionsName: "" })

    expect(error.message).toBe("No tenant is active while resolving LoggingOptions")
    expect(error.code).toBe("no_tenant_context")
  })
})

describe("isOptionsError", () => {
  const error = new NoTenantContextError({ optionsType: "LoggingOptions", optionsName: "" })

  it("matches any code without a filter", () => {
    expect(isOptionsError(error)).toBe(true)
    expect(isOptionsError(new Error("plain"))).toBe(false)
    expect(isOptionsError("no_tenant_context")).toBe(false)
  })

  it("matches a specific code", () => {
    expect(isOptionsError(error, "no_tenant_context")).toBe(true)
    expect(isOptionsError(error, "mutation_failure")).toBe(false)
  })
})

describe("serializeError", () => {
  it("serializes the cause chain", () => {
    const error = new BaseConfigurationError(
      { optionsType: "BillingOptions", optionsName: "", tenantId: "tenant-a" },
      new TypeError("not a number"),
    )

    const json = serializeError(error)

    expect(json).toMatchObject({
      name: "BaseConfigurationError",
      code: "base_configuration_failure",
      context: { optionsType: "BillingOptions", optionsName: "", tenantId: "tenant-a" },
      isOperational: true,
      cause: { name: "TypeError", code: "unknown", message: "not a number" },
    })
    expect(json.stack).toBeUndefined()
    expect(error.toJSON()).toMatchObject({ code: "base_configuration_failure" })
  })

  it("includes stacks on request", () => {
    const json = serializeError(new Error("plain"), { includeStack: true })

    expect(json.stack).toContain("plain")
  })

  it("handles thrown non-errors", () => {
    expect(serializeError("oops")).toMatchObject({
      name: "NonErrorThrown",
      message: "oops",
      context: { value: "oops" },
    })
  })
})
