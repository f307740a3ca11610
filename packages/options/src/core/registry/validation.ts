import type { OptionsType } from "../../ports/options-type"
import type { NameFilter } from "../../ports/tenant-mutator"
import { InvalidRegistrationError } from "../errors/errors"

export function assertOptionsType(type: unknown, what: string): asserts type is OptionsType {
  if (typeof type !== "function") {
    throw new InvalidRegistrationError(`${what}: options type must be a class`, {
      received: typeof type,
    })
  }
}

export function assertFunction(fn: unknown, what: string): void {
  if (typeof fn !== "function") {
    throw new InvalidRegistrationError(`${what}: expected a function`, {
      received: fn === null ? "null" : typeof fn,
    })
  }
}

export function assertNameFilter(filter: unknown, what: string): asserts filter is NameFilter {
  if (typeof filter !== "object" || filter === null || !("kind" in filter)) {
    throw new InvalidRegistrationError(`${what}: a name filter is required`)
  }

  if (filter.kind === "all") return

  if (filter.kind !== "named" || !("name" in filter) || typeof filter.name !== "string") {
    throw new InvalidRegistrationError(`${what}: named filters need a string name`)
  }
}
