import type { OptionsName, OptionsType } from "./options-type"
import type { TenantInfo } from "./tenant-info"

/**
 * Customizes a configured options instance in place using tenant data.
 */
export type TenantMutator<T extends object, TTenant extends TenantInfo = TenantInfo> = (
  options: T,
  tenant: TTenant,
) => void | Promise<void>

/**
 * Which option names a registration applies to.
 */
export type NameFilter = { kind: "all" } | { kind: "named"; name: OptionsName }

export const allNames: NameFilter = Object.freeze({ kind: "all" })

export function named(name: OptionsName): NameFilter {
  return { kind: "named", name }
}

/**
 * A registered mutator with its type erased.
 *
 * `apply` checks the instance against the registered type before handing it
 * to the typed mutator.
 */
export type MutatorEntry<TTenant extends TenantInfo = TenantInfo> = Readonly<{
  /** Position in global registration order. */
  order: number
  filter: NameFilter
  apply(options: object, tenant: TTenant): void | Promise<void>
}>

/**
 * Read side of the mutator registry, as consumed during resolution.
 */
export interface MutatorSource<TTenant extends TenantInfo = TenantInfo> {
  /**
   * Mutators whose filter matches `name`, in registration order.
   * An empty list means the type has no tenant customization for `name`.
   */
  resolve(type: OptionsType, name: OptionsName): readonly MutatorEntry<TTenant>[]
}
