import type { OptionsName, OptionsType } from "../../ports/options-type"
import type { TenantInfo } from "../../ports/tenant-info"
import type {
  MutatorEntry,
  MutatorSource,
  NameFilter,
  TenantMutator,
} from "../../ports/tenant-mutator"
import { InvalidRegistrationError, InvariantViolationError } from "../errors/errors"
import { assertFunction, assertNameFilter, assertOptionsType } from "./validation"

/**
 * Per-type, append-only list of tenant mutators.
 *
 * Registration happens at startup; `freeze()` ends that phase and every
 * later `register` throws. Reads after freezing never change, so they need
 * no coordination.
 *
 * Registering the same function twice applies it twice.
 */
export class TenantMutatorRegistry<TTenant extends TenantInfo = TenantInfo>
  implements MutatorSource<TTenant>
{
  private readonly byType = new Map<OptionsType, MutatorEntry<TTenant>[]>()
  private frozen = false
  private count = 0

  register<T extends object>(
    type: OptionsType<T>,
    filter: NameFilter,
    mutate: TenantMutator<T, TTenant>,
  ): this {
    const what = "TenantMutatorRegistry.register"

    if (this.frozen) {
      throw new InvalidRegistrationError(`${what}: registry is frozen after startup`, {
        optionsType: typeof type === "function" ? type.name : undefined,
      })
    }

    assertOptionsType(type, what)
    assertNameFilter(filter, what)
    assertFunction(mutate, what)

    const entry: MutatorEntry<TTenant> = Object.freeze({
      order: this.count++,
      filter: Object.freeze({ ...filter }),
      apply: (options: object, tenant: TTenant) => {
        if (!(options instanceof type)) {
          throw new InvariantViolationError(`Mutator for ${type.name} received a foreign instance`, {
            optionsType: type.name,
          })
        }

        return mutate(options, tenant)
      },
    })

    const entries = this.byType.get(type)

    if (entries) {
      entries.push(entry)
    } else {
      this.byType.set(type, [entry])
    }

    return this
  }

  resolve(type: OptionsType, name: OptionsName): readonly MutatorEntry<TTenant>[] {
    const entries = this.byType.get(type)

    if (!entries) return []

    return entries.filter((e) => e.filter.kind === "all" || e.filter.name === name)
  }

  freeze(): void {
    this.frozen = true
  }

  get isFrozen(): boolean {
    return this.frozen
  }

  /** Total number of registrations across all types. */
  get size(): number {
    return this.count
  }
}
