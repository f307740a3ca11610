import { createNullLogger, type Logger } from "@tenantry/logger"
import { ConfigureOptionsPipeline } from "../../adapters/pipeline/configure-options-pipeline"
import type { OptionsCache } from "../../ports/options-cache"
import type { OptionsPipeline } from "../../ports/options-pipeline"
import type { OptionsName, OptionsType } from "../../ports/options-type"
import type { ServiceLifetime } from "../../ports/service-lifetime"
import type { TenantContextAccessor } from "../../ports/tenant-context"
import type { TenantInfo } from "../../ports/tenant-info"
import { allNames, named, type TenantMutator } from "../../ports/tenant-mutator"
import type { TenantStore } from "../../ports/tenant-store"
import type { TenantStrategy } from "../../ports/tenant-strategy"
import { MultiplexedOptionsCache } from "../cache/multiplexed-options-cache"
import { InvalidRegistrationError } from "../errors/errors"
import { TenantMutatorRegistry } from "../registry/tenant-mutator-registry"
import { OptionsResolver } from "../resolution/options-resolver"
import {
  createRegistration,
  createTypeRegistration,
  ServiceContainer,
  type ServiceFactory,
  type ServiceRegistration,
  type ServiceType,
} from "../services/service-container"
import { defaultSettings, type MultiTenantSettings } from "../settings/load-settings"
import { MultiTenantOptions } from "./multi-tenant-options"

export type MultiTenantBuilderDeps = {
  settings?: MultiTenantSettings
  logger?: Logger
}

export type BuildOptions<TTenant extends TenantInfo> = {
  tenantContext: TenantContextAccessor<TTenant>
  /**
   * Replaces the built-in pipeline. Cannot be combined with steps registered
   * through `configureOptions`.
   */
  pipeline?: OptionsPipeline
  cache?: OptionsCache
}

/**
 * Startup-time registration of per-tenant options and tenant services.
 *
 * Every method validates its input immediately and returns the builder.
 * `build()` freezes all registrations; the builder cannot be used afterwards.
 *
 * @example
 * ```ts
 * const options = new MultiTenantBuilder<AppTenant>({ settings, logger })
 *   .configureOptions((p) => p.configure(BillingOptions, (o) => { o.currency = "EUR" }))
 *   .withPerTenantOptions(BillingOptions, (o, tenant) => { o.planName = tenant.plan })
 *   .withStore("singleton", () => new PostgresTenantStore(pool))
 *   .build({ tenantContext })
 * ```
 */
export class MultiTenantBuilder<TTenant extends TenantInfo = TenantInfo> {
  private readonly registry = new TenantMutatorRegistry<TTenant>()
  private readonly pipeline = new ConfigureOptionsPipeline()
  private readonly strategies: ServiceRegistration<TenantStrategy>[] = []
  private readonly stores: ServiceRegistration<TenantStore<TTenant>>[] = []
  private readonly settings: MultiTenantSettings
  private readonly logger: Logger
  private nextServiceId = 0
  private built = false

  constructor(deps: MultiTenantBuilderDeps = {}) {
    this.settings = deps.settings ?? defaultSettings
    this.logger = deps.logger ?? createNullLogger()
  }

  /** Customize every name of `type` per tenant. */
  withPerTenantOptions<T extends object>(
    type: OptionsType<T>,
    mutate: TenantMutator<T, TTenant>,
  ): this {
    this.assertOpen("withPerTenantOptions")
    this.registry.register(type, allNames, mutate)

    return this
  }

  /** Customize one name of `type` per tenant. */
  withPerTenantNamedOptions<T extends object>(
    type: OptionsType<T>,
    name: OptionsName,
    mutate: TenantMutator<T, TTenant>,
  ): this {
    this.assertOpen("withPerTenantNamedOptions")

    if (typeof name !== "string") {
      throw new InvalidRegistrationError("withPerTenantNamedOptions: name must be a string", {
        optionsType: typeof type === "function" ? type.name : undefined,
      })
    }

    this.registry.register(type, named(name), mutate)

    return this
  }

  /** Register base configure/post-configure/validate steps. */
  configureOptions(configure: (pipeline: ConfigureOptionsPipeline) => void): this {
    this.assertOpen("configureOptions")

    if (typeof configure !== "function") {
      throw new InvalidRegistrationError("configureOptions: expected a function")
    }

    configure(this.pipeline)

    return this
  }

  /** Register a tenant strategy. Several strategies may be registered. */
  withStrategy(lifetime: ServiceLifetime, factory: ServiceFactory<TenantStrategy>): this {
    this.assertOpen("withStrategy")
    this.strategies.push(createRegistration(this.nextServiceId++, lifetime, factory, "withStrategy"))

    return this
  }

  /** Register a tenant store. Several stores may be registered. */
  withStore(lifetime: ServiceLifetime, factory: ServiceFactory<TenantStore<TTenant>>): this {
    this.assertOpen("withStore")
    this.stores.push(createRegistration(this.nextServiceId++, lifetime, factory, "withStore"))

    return this
  }

  /**
   * Register a tenant strategy by class. `args` are passed to its constructor
   * each time the lifetime calls for a new instance.
   */
  withStrategyType<A extends unknown[]>(
    lifetime: ServiceLifetime,
    type: ServiceType<TenantStrategy, A>,
    ...args: A
  ): this {
    this.assertOpen("withStrategyType")
    this.strategies.push(
      createTypeRegistration(this.nextServiceId++, lifetime, type, args, "withStrategyType"),
    )

    return this
  }

  /** Register a tenant store by class; see {@link withStrategyType}. */
  withStoreType<A extends unknown[]>(
    lifetime: ServiceLifetime,
    type: ServiceType<TenantStore<TTenant>, A>,
    ...args: A
  ): this {
    this.assertOpen("withStoreType")
    this.stores.push(
      createTypeRegistration(this.nextServiceId++, lifetime, type, args, "withStoreType"),
    )

    return this
  }

  build(options: BuildOptions<TTenant>): MultiTenantOptions<TTenant> {
    this.assertOpen("build")

    if (typeof options?.tenantContext?.current !== "function") {
      throw new InvalidRegistrationError("build: a tenant context accessor is required")
    }

    if (options.pipeline && !this.pipeline.isEmpty) {
      throw new InvalidRegistrationError(
        "build: a custom pipeline cannot be combined with configureOptions steps",
      )
    }

    this.built = true
    this.registry.freeze()
    this.pipeline.freeze()

    const cache = options.cache ?? new MultiplexedOptionsCache({ logger: this.logger })

    const resolver = new OptionsResolver<TTenant>(
      {
        cache,
        mutators: this.registry,
        pipeline: options.pipeline ?? this.pipeline,
        tenantContext: options.tenantContext,
        logger: this.logger,
      },
      { requireTenant: this.settings.requireTenant },
    )

    const services = new ServiceContainer<TTenant>(
      { strategies: [...this.strategies], stores: [...this.stores] },
      { settings: this.settings, logger: this.logger },
    )

    this.logger.info("multi-tenant options built", {
      mutators: this.registry.size,
      strategies: services.strategyCount,
      stores: services.storeCount,
      requireTenant: this.settings.requireTenant,
    })

    return new MultiTenantOptions<TTenant>({
      resolver,
      cache,
      tenantContext: options.tenantContext,
      services,
      settings: this.settings,
      logger: this.logger,
    })
  }

  private assertOpen(what: string): void {
    if (this.built) {
      throw new InvalidRegistrationError(`${what}: builder was already built`)
    }
  }
}
