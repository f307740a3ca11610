import { createNullLogger, type Logger } from "@tenantry/logger"
import type { OptionsCache, OptionsCacheKey } from "../../ports/options-cache"
import type { OptionsPipeline } from "../../ports/options-pipeline"
import { DEFAULT_OPTIONS_NAME, type OptionsName, type OptionsType } from "../../ports/options-type"
import type { TenantContextAccessor } from "../../ports/tenant-context"
import type { TenantId, TenantInfo } from "../../ports/tenant-info"
import type { MutatorSource } from "../../ports/tenant-mutator"
import {
  BaseConfigurationError,
  InvalidTenantError,
  MutationError,
  NoTenantContextError,
  type ResolutionContext,
} from "../errors/errors"
import { OptionsAccessor } from "./options-accessor"

export type OptionsResolverDeps<TTenant extends TenantInfo> = {
  cache: OptionsCache
  mutators: MutatorSource<TTenant>
  pipeline: OptionsPipeline
  tenantContext: TenantContextAccessor<TTenant>
  logger?: Logger
}

export type OptionsResolverConfig = {
  /** Fail instead of using the host instance when no tenant is active. */
  requireTenant: boolean
}

export type ResolveOptions = {
  /** Overrides {@link OptionsResolverConfig.requireTenant} for one call. */
  requireTenant?: boolean
}

/**
 * Resolves options instances for the active tenant.
 *
 * On a cache miss an instance is built as:
 * base `create` → tenant mutators in registration order → base `complete`.
 * Only fully built instances are cached; any failure leaves the key empty so
 * the next caller starts over.
 */
export class OptionsResolver<TTenant extends TenantInfo = TenantInfo> {
  private readonly logger: Logger

  constructor(
    private readonly deps: OptionsResolverDeps<TTenant>,
    private readonly config: OptionsResolverConfig,
  ) {
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "options-resolver" })
  }

  async resolve<T extends object>(
    type: OptionsType<T>,
    name: OptionsName = DEFAULT_OPTIONS_NAME,
    opts: ResolveOptions = {},
  ): Promise<T> {
    assertResolvable(type, "OptionsResolver.resolve")

    const tenant = this.deps.tenantContext.current()

    if (tenant === undefined) {
      if (opts.requireTenant ?? this.config.requireTenant) {
        throw new NoTenantContextError({ optionsType: type.name, optionsName: name })
      }

      return this.deps.cache.getOrCreate({ type, name, tenantId: null }, () =>
        this.build(type, name, undefined),
      )
    }

    // Captured once: the whole build sees the tenant that started it.
    const tenantId = tenantIdOf(tenant)

    return this.deps.cache.getOrCreate({ type, name, tenantId }, () =>
      this.build(type, name, tenant),
    )
  }

  /** Typed handle for one options type. */
  accessor<T extends object>(type: OptionsType<T>): OptionsAccessor<T, TTenant> {
    assertResolvable(type, "OptionsResolver.accessor")

    return new OptionsAccessor(this, type)
  }

  /**
   * Forget the cached instances of `type` for the active tenant (or the host
   * slot outside a tenant scope), optionally only for one name.
   */
  reset(type: OptionsType, name?: OptionsName): number {
    const tenant = this.deps.tenantContext.current()
    const tenantId = tenant === undefined ? null : tenantIdOf(tenant)

    return this.deps.cache.invalidateScope({
      type,
      tenantId,
      ...(name !== undefined && { name }),
    })
  }

  invalidate<T extends object>(key: OptionsCacheKey<T>): boolean {
    return this.deps.cache.invalidate(key)
  }

  invalidateTenant(tenantId: TenantId): number {
    return this.deps.cache.invalidateTenant(tenantId)
  }

  invalidateType(type: OptionsType): number {
    return this.deps.cache.invalidateType(type)
  }

  private async build<T extends object>(
    type: OptionsType<T>,
    name: OptionsName,
    tenant: TTenant | undefined,
  ): Promise<T> {
    const ctx: ResolutionContext = {
      optionsType: type.name,
      optionsName: name,
      tenantId: tenant === undefined ? null : tenant.id,
    }
    const logger = this.logger.child(toLogContext(ctx))

    logger.debug("building options")

    try {
      const options = await this.create(type, ctx)

      if (tenant !== undefined) {
        await this.mutate(type, options, tenant, ctx)
      }

      await this.complete(type, options, ctx)

      logger.debug("options built")

      return options
    } catch (err) {
      logger.debug("options build failed", { err })
      throw err
    }
  }

  private async create<T extends object>(
    type: OptionsType<T>,
    ctx: ResolutionContext,
  ): Promise<T> {
    let options: unknown

    try {
      options = await this.deps.pipeline.create(type, ctx.optionsName)
    } catch (err) {
      throw new BaseConfigurationError(ctx, err)
    }

    if (!(options instanceof type)) {
      throw new BaseConfigurationError(
        ctx,
        new TypeError(`pipeline did not return an instance of ${type.name}`),
      )
    }

    return options
  }

  private async mutate<T extends object>(
    type: OptionsType<T>,
    options: T,
    tenant: TTenant,
    ctx: ResolutionContext,
  ): Promise<void> {
    const mutators = this.deps.mutators.resolve(type, ctx.optionsName)

    for (const [mutatorIndex, mutator] of mutators.entries()) {
      try {
        await mutator.apply(options, tenant)
      } catch (err) {
        throw new MutationError({ ...ctx, mutatorIndex }, err)
      }
    }
  }

  private async complete<T extends object>(
    type: OptionsType<T>,
    options: T,
    ctx: ResolutionContext,
  ): Promise<void> {
    try {
      await this.deps.pipeline.complete(type, ctx.optionsName, options)
    } catch (err) {
      throw new BaseConfigurationError(ctx, err)
    }
  }
}

function assertResolvable(type: unknown, what: string): asserts type is OptionsType {
  if (typeof type !== "function") {
    throw new TypeError(`${what}: options type must be a class, received ${typeof type}`)
  }
}

function tenantIdOf(tenant: TenantInfo): TenantId {
  if (typeof tenant.id !== "string" || tenant.id.length === 0) {
    throw new InvalidTenantError("Active tenant has no usable id", {
      identifier: tenant.identifier,
    })
  }

  return tenant.id
}

function toLogContext(ctx: ResolutionContext) {
  return {
    optionsType: ctx.optionsType,
    optionsName: ctx.optionsName,
    ...(ctx.tenantId !== null && { tenantId: ctx.tenantId }),
  }
}
