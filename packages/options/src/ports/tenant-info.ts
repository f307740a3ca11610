/**
 * Opaque tenant identity. Two tenants are the same tenant iff their ids are equal.
 */
export type TenantId = string

/**
 * Tenant record as seen by options resolution. Applications extend it with
 * whatever their mutators need (plan, region, feature switches, ...).
 */
export interface TenantInfo {
  readonly id: TenantId

  /** External identifier a strategy matched on (host name, route segment, ...). */
  readonly identifier: string

  readonly name?: string
}
