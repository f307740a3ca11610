import type { TenantInfo } from "./tenant-info"

/**
 * Looks up tenant records by the identifier a strategy produced.
 */
export interface TenantStore<TTenant extends TenantInfo = TenantInfo> {
  findByIdentifier(identifier: string): Promise<TTenant | undefined>
}
