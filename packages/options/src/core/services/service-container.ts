import type { Logger } from "@tenantry/logger"
import { type ServiceLifetime, serviceLifetimes } from "../../ports/service-lifetime"
import type { TenantInfo } from "../../ports/tenant-info"
import type { TenantStore } from "../../ports/tenant-store"
import type { TenantStrategy } from "../../ports/tenant-strategy"
import { InvalidRegistrationError } from "../errors/errors"
import { assertFunction } from "../registry/validation"
import type { MultiTenantSettings } from "../settings/load-settings"

/**
 * Everything a strategy or store factory may depend on. Factories receive
 * their dependencies here instead of looking them up.
 */
export type ServiceFactoryContext = Readonly<{
  settings: MultiTenantSettings
  logger: Logger
}>

export type ServiceFactory<S> = (ctx: ServiceFactoryContext) => S

export type ServiceRegistration<S> = Readonly<{
  id: number
  lifetime: ServiceLifetime
  factory: ServiceFactory<S>
}>

export function createRegistration<S>(
  id: number,
  lifetime: ServiceLifetime,
  factory: ServiceFactory<S>,
  what: string,
): ServiceRegistration<S> {
  if (!serviceLifetimes.includes(lifetime)) {
    throw new InvalidRegistrationError(`${what}: unknown service lifetime`, {
      lifetime: String(lifetime),
    })
  }

  assertFunction(factory, what)

  return Object.freeze({ id, lifetime, factory })
}

/**
 * A strategy or store class, constructed with the arguments given at
 * registration.
 */
export type ServiceType<S, A extends unknown[] = []> = new (...args: A) => S

export function createTypeRegistration<S, A extends unknown[]>(
  id: number,
  lifetime: ServiceLifetime,
  type: ServiceType<S, A>,
  args: A,
  what: string,
): ServiceRegistration<S> {
  // Arrow functions have no prototype and cannot be constructed.
  if (typeof type !== "function" || type.prototype === undefined) {
    throw new InvalidRegistrationError(`${what}: expected a class`, {
      received: type === null ? "null" : typeof type,
    })
  }

  return createRegistration(id, lifetime, () => new type(...args), what)
}

/**
 * Instances owned by one scope (typically one request).
 */
export class ServiceScope<TTenant extends TenantInfo = TenantInfo> {
  readonly strategies = new Map<number, TenantStrategy>()
  readonly stores = new Map<number, TenantStore<TTenant>>()
}

export type ServiceRegistrations<TTenant extends TenantInfo> = Readonly<{
  strategies: readonly ServiceRegistration<TenantStrategy>[]
  stores: readonly ServiceRegistration<TenantStore<TTenant>>[]
}>

/**
 * Hands out the tenant strategies and stores registered at startup,
 * honoring each registration's lifetime. Several registrations of a kind are
 * returned in registration order; what the caller does with them is its
 * business.
 */
export class ServiceContainer<TTenant extends TenantInfo = TenantInfo> {
  private readonly root = new ServiceScope<TTenant>()

  constructor(
    private readonly registrations: ServiceRegistrations<TTenant>,
    private readonly context: ServiceFactoryContext,
  ) {}

  createScope(): ServiceScope<TTenant> {
    return new ServiceScope<TTenant>()
  }

  strategies(scope: ServiceScope<TTenant>): TenantStrategy[] {
    return this.registrations.strategies.map((registration) =>
      this.instantiate(registration, this.root.strategies, scope.strategies),
    )
  }

  stores(scope: ServiceScope<TTenant>): TenantStore<TTenant>[] {
    return this.registrations.stores.map((registration) =>
      this.instantiate(registration, this.root.stores, scope.stores),
    )
  }

  get strategyCount(): number {
    return this.registrations.strategies.length
  }

  get storeCount(): number {
    return this.registrations.stores.length
  }

  private instantiate<S>(
    registration: ServiceRegistration<S>,
    singletons: Map<number, S>,
    scoped: Map<number, S>,
  ): S {
    if (registration.lifetime === "transient") return registration.factory(this.context)

    const owner = registration.lifetime === "singleton" ? singletons : scoped
    const existing = owner.get(registration.id)

    if (existing !== undefined) return existing

    const instance = registration.factory(this.context)
    owner.set(registration.id, instance)

    return instance
  }
}
