import type { OptionsCacheKey } from "../../ports/options-cache"
import type { OptionsType } from "../../ports/options-type"

/**
 * Turns structured cache keys into stable strings.
 *
 * Types are identified by reference, so each constructor is assigned a
 * numeric slot the first time it is seen. The encoded form is a JSON tuple,
 * which keeps names and tenant ids containing separators unambiguous.
 */
export class CacheKeyEncoder {
  private readonly slots = new WeakMap<OptionsType, number>()
  private nextSlot = 0

  encode(key: OptionsCacheKey): string {
    return JSON.stringify([this.slotOf(key.type), key.name, key.tenantId])
  }

  private slotOf(type: OptionsType): number {
    let slot = this.slots.get(type)

    if (slot === undefined) {
      slot = this.nextSlot++
      this.slots.set(type, slot)
    }

    return slot
  }
}
