import { AsyncLocalStorage } from "node:async_hooks"
import type { TenantContextAccessor } from "../../ports/tenant-context"
import type { TenantInfo } from "../../ports/tenant-info"
import { assertTenant } from "./assert-tenant"

/**
 * Tenant context carried through async continuations.
 *
 * @example
 * ```ts
 * const tenants = new AsyncTenantContext<AppTenant>()
 *
 * app.use(async (c, next) => {
 *   const tenant = await resolveTenant(c.req)
 *   return tenants.run(tenant, next)
 * })
 * ```
 */
export class AsyncTenantContext<TTenant extends TenantInfo = TenantInfo>
  implements TenantContextAccessor<TTenant>
{
  private readonly storage = new AsyncLocalStorage<TTenant>()

  current(): TTenant | undefined {
    return this.storage.getStore()
  }

  /**
   * Run `fn` with `tenant` active. Nested calls shadow the outer tenant for
   * their own duration.
   */
  run<R>(tenant: TTenant, fn: () => R): R {
    assertTenant(tenant)

    return this.storage.run(tenant, fn)
  }

  /** Run `fn` with no tenant active, even inside an outer `run`. */
  exit<R>(fn: () => R): R {
    return this.storage.exit(fn)
  }
}
