import type { TenantContextAccessor } from "../../ports/tenant-context"
import type { TenantInfo } from "../../ports/tenant-info"
import { assertTenant } from "./assert-tenant"

/**
 * Always reports the same tenant (or none). For jobs, scripts and tests that
 * act on behalf of one tenant for their whole lifetime.
 */
export class StaticTenantContext<TTenant extends TenantInfo = TenantInfo>
  implements TenantContextAccessor<TTenant>
{
  constructor(private readonly tenant?: TTenant) {
    if (tenant !== undefined) assertTenant(tenant)
  }

  current(): TTenant | undefined {
    return this.tenant
  }
}
