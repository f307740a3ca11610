import type { Logger } from "@tenantry/logger"
import type { OptionsCache } from "../../ports/options-cache"
import type { OptionsName, OptionsType } from "../../ports/options-type"
import type { TenantContextAccessor } from "../../ports/tenant-context"
import type { TenantId, TenantInfo } from "../../ports/tenant-info"
import type { OptionsAccessor } from "../resolution/options-accessor"
import type { OptionsResolver, ResolveOptions } from "../resolution/options-resolver"
import type { ServiceContainer } from "../services/service-container"
import type { MultiTenantSettings } from "../settings/load-settings"

export type MultiTenantOptionsParts<TTenant extends TenantInfo> = Readonly<{
  resolver: OptionsResolver<TTenant>
  cache: OptionsCache
  tenantContext: TenantContextAccessor<TTenant>
  services: ServiceContainer<TTenant>
  settings: MultiTenantSettings
  logger: Logger
}>

/**
 * The wired, read-only options system produced by `MultiTenantBuilder.build()`.
 * Share one instance across the process.
 */
export class MultiTenantOptions<TTenant extends TenantInfo = TenantInfo> {
  readonly resolver: OptionsResolver<TTenant>
  readonly cache: OptionsCache
  readonly tenantContext: TenantContextAccessor<TTenant>
  readonly services: ServiceContainer<TTenant>
  readonly settings: MultiTenantSettings
  readonly logger: Logger

  constructor(parts: MultiTenantOptionsParts<TTenant>) {
    this.resolver = parts.resolver
    this.cache = parts.cache
    this.tenantContext = parts.tenantContext
    this.services = parts.services
    this.settings = parts.settings
    this.logger = parts.logger
  }

  resolve<T extends object>(
    type: OptionsType<T>,
    name?: OptionsName,
    opts?: ResolveOptions,
  ): Promise<T> {
    return this.resolver.resolve(type, name, opts)
  }

  accessor<T extends object>(type: OptionsType<T>): OptionsAccessor<T, TTenant> {
    return this.resolver.accessor(type)
  }

  /** Drop every cached instance of a tenant, e.g. after its record changed. */
  invalidateTenant(tenantId: TenantId): number {
    const removed = this.resolver.invalidateTenant(tenantId)

    this.logger.info("tenant options invalidated", { tenantId, removed })

    return removed
  }

  /** Drop every cached instance of a type, e.g. after its base configuration changed. */
  invalidateType(type: OptionsType): number {
    const removed = this.resolver.invalidateType(type)

    this.logger.info("options type invalidated", { optionsType: type.name, removed })

    return removed
  }
}
