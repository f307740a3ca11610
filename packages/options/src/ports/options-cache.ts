import type { OptionsName, OptionsType } from "./options-type"
import type { TenantId } from "./tenant-info"

/**
 * Addresses one resolved options instance.
 *
 * `tenantId` is `null` for the un-multiplexed host slot, which is only used
 * when a caller explicitly resolves outside any tenant.
 */
export type OptionsCacheKey<T extends object = object> = Readonly<{
  type: OptionsType<T>
  name: OptionsName
  tenantId: TenantId | null
}>

/**
 * A stored instance together with its bookkeeping.
 */
export type OptionsCacheEntry<T extends object = object> = Readonly<{
  value: T
  /** Monotonic write sequence; a recomputed entry always has a higher one. */
  generation: number
  createdAt: Date
}>

/**
 * Selects entries for bulk invalidation. Omitted fields match everything.
 */
export type InvalidationScope = Readonly<{
  type?: OptionsType
  name?: OptionsName
  tenantId?: TenantId | null
}>

/**
 * Instance cache keyed by (type, name, tenant).
 *
 * @remarks
 * - Entries have no TTL; they live until invalidated.
 * - At most one instance is durably stored per key.
 * - A failed factory never leaves an entry behind.
 */
export interface OptionsCache {
  /**
   * Return the stored instance for `key`, or run `factory` and store its result.
   *
   * Concurrent callers for one key share a single factory run. A result whose
   * key was invalidated while the factory ran is returned but not stored.
   */
  getOrCreate<T extends object>(key: OptionsCacheKey<T>, factory: () => Promise<T>): Promise<T>

  /** Stored instance for `key` without running anything. */
  peek<T extends object>(key: OptionsCacheKey<T>): T | undefined

  /** Stored entry for `key`, with its generation and creation time. */
  entry<T extends object>(key: OptionsCacheKey<T>): OptionsCacheEntry<T> | undefined

  /** Store `value` unless `key` already holds one. Returns whether it was stored. */
  tryAdd<T extends object>(key: OptionsCacheKey<T>, value: T): boolean

  /** Remove one entry. Returns whether an entry was removed. */
  invalidate(key: OptionsCacheKey): boolean

  /** Remove every entry of one tenant, across types and names. */
  invalidateTenant(tenantId: TenantId): number

  /** Remove every entry of one type, across tenants and names. */
  invalidateType(type: OptionsType): number

  /** Remove every entry matching `scope`. Returns the number removed. */
  invalidateScope(scope: InvalidationScope): number

  clear(): void

  /** Number of stored entries. */
  readonly size: number

  /** Number of factory runs in progress. */
  readonly inFlight: number
}
