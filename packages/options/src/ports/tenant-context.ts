import type { TenantInfo } from "./tenant-info"

/**
 * Supplies the tenant of the logical operation currently executing
 * (typically one inbound request).
 */
export interface TenantContextAccessor<TTenant extends TenantInfo = TenantInfo> {
  /** The active tenant, or `undefined` outside any tenant scope. */
  current(): TTenant | undefined
}
