import { DEFAULT_OPTIONS_NAME, type OptionsName, type OptionsType } from "../../ports/options-type"
import type { TenantInfo } from "../../ports/tenant-info"
import type { OptionsResolver, ResolveOptions } from "./options-resolver"

/**
 * Options of one type, resolved for whichever tenant is active at call time.
 *
 * Hold on to an accessor instead of an instance: the instance differs per tenant.
 *
 * @example
 * ```ts
 * const billing = options.accessor(BillingOptions)
 *
 * // inside a tenant scope
 * const { planName } = await billing.value()
 * ```
 */
export class OptionsAccessor<T extends object, TTenant extends TenantInfo = TenantInfo> {
  constructor(
    private readonly resolver: OptionsResolver<TTenant>,
    readonly type: OptionsType<T>,
  ) {}

  /** The unnamed instance. */
  value(opts?: ResolveOptions): Promise<T> {
    return this.resolver.resolve(this.type, DEFAULT_OPTIONS_NAME, opts)
  }

  get(name: OptionsName, opts?: ResolveOptions): Promise<T> {
    return this.resolver.resolve(this.type, name, opts)
  }

  /**
   * Drop this type's cached instances for the active tenant so the next read
   * rebuilds them. Returns how many were dropped.
   */
  reset(name?: OptionsName): number {
    return this.resolver.reset(this.type, name)
  }
}
