import { type ZodType, z } from "zod"
import {
  InvalidRegistrationError,
  InvariantViolationError,
  OptionsValidationError,
} from "../../core/errors/errors"
import {
  assertFunction,
  assertNameFilter,
  assertOptionsType,
} from "../../core/registry/validation"
import type { OptionsPipeline } from "../../ports/options-pipeline"
import type { OptionsName, OptionsType } from "../../ports/options-type"
import { allNames, type NameFilter, named } from "../../ports/tenant-mutator"

export type ConfigureStep<T extends object> = (
  options: T,
  name: OptionsName,
) => void | Promise<void>

type Stage = "configure" | "postConfigure"

type Step = {
  stage: Stage
  filter: NameFilter
  run(options: object, name: OptionsName): void | Promise<void>
}

type Validation = {
  filter: NameFilter
  schema: ZodType
}

/**
 * Tenant-unaware options pipeline built from registered steps.
 *
 * `create` constructs the instance and runs configure steps; `complete` runs
 * post-configure steps, then validations. Steps run in registration order.
 *
 * @example
 * ```ts
 * const pipeline = new ConfigureOptionsPipeline()
 *   .configure(BillingOptions, (o) => { o.currency = "EUR" })
 *   .postConfigure(BillingOptions, (o) => { o.planName = o.planName.toLowerCase() })
 *   .validate(BillingOptions, z.object({ planName: z.string().min(1) }))
 * ```
 */
export class ConfigureOptionsPipeline implements OptionsPipeline {
  private readonly steps = new Map<OptionsType, Step[]>()
  private readonly validations = new Map<OptionsType, Validation[]>()
  private frozen = false

  configure<T extends object>(type: OptionsType<T>, step: ConfigureStep<T>): this {
    return this.addStep("configure", type, allNames, step)
  }

  configureNamed<T extends object>(
    type: OptionsType<T>,
    name: OptionsName,
    step: ConfigureStep<T>,
  ): this {
    return this.addStep("configure", type, named(name), step)
  }

  postConfigure<T extends object>(type: OptionsType<T>, step: ConfigureStep<T>): this {
    return this.addStep("postConfigure", type, allNames, step)
  }

  postConfigureNamed<T extends object>(
    type: OptionsType<T>,
    name: OptionsName,
    step: ConfigureStep<T>,
  ): this {
    return this.addStep("postConfigure", type, named(name), step)
  }

  /**
   * Validate completed instances of `type` against `schema`.
   * Without `name` the schema applies to every name.
   */
  validate<T extends object>(type: OptionsType<T>, schema: ZodType, name?: OptionsName): this {
    const what = "ConfigureOptionsPipeline.validate"

    this.assertOpen(what)
    assertOptionsType(type, what)

    if (!(schema instanceof z.ZodType)) {
      throw new InvalidRegistrationError(`${what}: a zod schema is required`, {
        optionsType: type.name,
      })
    }

    const filter = name === undefined ? allNames : named(name)
    append(this.validations, type, { filter, schema })

    return this
  }

  /** Ends registration; later calls throw. */
  freeze(): void {
    this.frozen = true
  }

  get isFrozen(): boolean {
    return this.frozen
  }

  /** Whether any step or validation was registered. */
  get isEmpty(): boolean {
    return this.steps.size === 0 && this.validations.size === 0
  }

  async create<T extends object>(type: OptionsType<T>, name: OptionsName): Promise<T> {
    const options = new type()

    await this.runStage("configure", type, name, options)

    return options
  }

  async complete<T extends object>(
    type: OptionsType<T>,
    name: OptionsName,
    options: T,
  ): Promise<void> {
    await this.runStage("postConfigure", type, name, options)

    for (const validation of this.validations.get(type) ?? []) {
      if (!appliesTo(validation.filter, name)) continue

      const result = validation.schema.safeParse(options)

      if (!result.success) {
        throw new OptionsValidationError(type.name, name, z.prettifyError(result.error))
      }
    }
  }

  private async runStage(
    stage: Stage,
    type: OptionsType,
    name: OptionsName,
    options: object,
  ): Promise<void> {
    for (const step of this.steps.get(type) ?? []) {
      if (step.stage === stage && appliesTo(step.filter, name)) {
        await step.run(options, name)
      }
    }
  }

  private addStep<T extends object>(
    stage: Stage,
    type: OptionsType<T>,
    filter: NameFilter,
    step: ConfigureStep<T>,
  ): this {
    const what = `ConfigureOptionsPipeline.${stage}`

    this.assertOpen(what)
    assertOptionsType(type, what)
    assertNameFilter(filter, what)
    assertFunction(step, what)

    append(this.steps, type, {
      stage,
      filter,
      run: (options, name) => {
        if (!(options instanceof type)) {
          throw new InvariantViolationError(`Step for ${type.name} received a foreign instance`, {
            optionsType: type.name,
          })
        }

        return step(options, name)
      },
    })

    return this
  }

  private assertOpen(what: string): void {
    if (this.frozen) {
      throw new InvalidRegistrationError(`${what}: pipeline is frozen after startup`)
    }
  }
}

function appliesTo(filter: NameFilter, name: OptionsName): boolean {
  return filter.kind === "all" || filter.name === name
}

function append<V>(map: Map<OptionsType, V[]>, type: OptionsType, value: V): void {
  const list = map.get(type)

  if (list) {
    list.push(value)
  } else {
    map.set(type, [value])
  }
}
