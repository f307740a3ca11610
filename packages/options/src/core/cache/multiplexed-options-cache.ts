import { createNullLogger, type Logger, type LogMeta } from "@tenantry/logger"
import type {
  InvalidationScope,
  OptionsCache,
  OptionsCacheEntry,
  OptionsCacheKey,
} from "../../ports/options-cache"
import type { OptionsType } from "../../ports/options-type"
import type { TenantId } from "../../ports/tenant-info"
import { InvariantViolationError } from "../errors/errors"
import { CacheKeyEncoder } from "./cache-key"

export type MultiplexedOptionsCacheDeps = {
  logger?: Logger
}

type StoredEntry = {
  key: OptionsCacheKey
  value: object
  generation: number
  createdAt: Date
}

type InFlight = {
  key: OptionsCacheKey
  promise: Promise<object>
  /** Set when the key is invalidated mid-flight; the result must not be stored. */
  detached: boolean
}

/**
 * In-process options cache multiplexed by (type, name, tenant).
 *
 * Every state change happens synchronously between awaits, so each one is
 * atomic with respect to other resolutions. Concurrent misses for one key
 * join a single factory run.
 */
export class MultiplexedOptionsCache implements OptionsCache {
  private readonly encoder = new CacheKeyEncoder()
  private readonly entries = new Map<string, StoredEntry>()
  private readonly flights = new Map<string, InFlight>()
  private readonly logger: Logger
  private generation = 0

  constructor(deps: MultiplexedOptionsCacheDeps = {}) {
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "options-cache" })
  }

  async getOrCreate<T extends object>(
    key: OptionsCacheKey<T>,
    factory: () => Promise<T>,
  ): Promise<T> {
    const id = this.encoder.encode(key)
    const stored = this.entries.get(id)

    if (stored) return this.narrow(key, stored.value)

    const existing = this.flights.get(id)

    if (existing) return this.narrow(key, await existing.promise)

    // The factory starts on the next microtask, after the flight is registered.
    // A result of the wrong type fails the flight before anything is stored.
    const promise = Promise.resolve()
      .then(factory)
      .then((value) => this.settle(id, flight, this.narrow(key, value)))
      .finally(() => {
        if (this.flights.get(id) === flight) this.flights.delete(id)
      })

    const flight: InFlight = { key, detached: false, promise }

    this.flights.set(id, flight)

    return this.narrow(key, await flight.promise)
  }

  peek<T extends object>(key: OptionsCacheKey<T>): T | undefined {
    return this.entry(key)?.value
  }

  entry<T extends object>(key: OptionsCacheKey<T>): OptionsCacheEntry<T> | undefined {
    const stored = this.entries.get(this.encoder.encode(key))

    if (!stored) return undefined

    return {
      value: this.narrow(key, stored.value),
      generation: stored.generation,
      createdAt: stored.createdAt,
    }
  }

  tryAdd<T extends object>(key: OptionsCacheKey<T>, value: T): boolean {
    const id = this.encoder.encode(key)

    if (this.entries.has(id)) return false

    this.store(id, key, value)
    return true
  }

  invalidate(key: OptionsCacheKey): boolean {
    const id = this.encoder.encode(key)

    this.detach(id)
    return this.entries.delete(id)
  }

  invalidateTenant(tenantId: TenantId): number {
    return this.invalidateScope({ tenantId })
  }

  invalidateType(type: OptionsType): number {
    return this.invalidateScope({ type })
  }

  invalidateScope(scope: InvalidationScope): number {
    for (const [id, flight] of this.flights) {
      if (matches(flight.key, scope)) this.detach(id)
    }

    let removed = 0

    for (const [id, stored] of this.entries) {
      if (matches(stored.key, scope)) {
        this.entries.delete(id)
        removed++
      }
    }

    this.logger.debug("options cache invalidated", {
      ...describeScope(scope),
      removed,
    })

    return removed
  }

  clear(): void {
    for (const id of [...this.flights.keys()]) this.detach(id)

    this.entries.clear()
  }

  get size(): number {
    return this.entries.size
  }

  get inFlight(): number {
    return this.flights.size
  }

  private settle(id: string, flight: InFlight, value: object): object {
    if (flight.detached) return value

    // First durable write wins; later results yield to it.
    const stored = this.entries.get(id)

    if (stored) return stored.value

    this.store(id, flight.key, value)
    return value
  }

  private store(id: string, key: OptionsCacheKey, value: object): void {
    this.entries.set(id, {
      key,
      value,
      generation: ++this.generation,
      createdAt: new Date(),
    })
  }

  private detach(id: string): void {
    const flight = this.flights.get(id)

    if (flight) {
      flight.detached = true
      this.flights.delete(id)
    }
  }

  private narrow<T extends object>(key: OptionsCacheKey<T>, value: object): T {
    if (value instanceof key.type) return value

    throw new InvariantViolationError(`Cached value is not an instance of ${key.type.name}`, {
      optionsType: key.type.name,
      optionsName: key.name,
      tenantId: key.tenantId,
    })
  }
}

function matches(key: OptionsCacheKey, scope: InvalidationScope): boolean {
  if (scope.type !== undefined && key.type !== scope.type) return false
  if (scope.name !== undefined && key.name !== scope.name) return false
  if (scope.tenantId !== undefined && key.tenantId !== scope.tenantId) return false

  return true
}

function describeScope(scope: InvalidationScope): LogMeta {
  const meta: LogMeta = {}

  if (scope.type) meta.optionsType = scope.type.name
  if (scope.name !== undefined) meta.optionsName = scope.name

  if (scope.tenantId === null) {
    meta.hostSlot = true
  } else if (scope.tenantId !== undefined) {
    meta.tenantId = scope.tenantId
  }

  return meta
}
