import { InvalidTenantError } from "../../core/errors/errors"
import type { TenantInfo } from "../../ports/tenant-info"

export function assertTenant(tenant: TenantInfo): void {
  if (typeof tenant !== "object" || tenant === null) {
    throw new InvalidTenantError("Tenant must be an object")
  }

  if (typeof tenant.id !== "string" || tenant.id.length === 0) {
    throw new InvalidTenantError("Tenant id must be a non-empty string", {
      identifier: tenant.identifier,
    })
  }
}
