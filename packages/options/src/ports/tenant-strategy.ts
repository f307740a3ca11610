/**
 * Extracts a tenant identifier from an inbound operation (request, message, job).
 *
 * Only the contract lives here; registration passes implementations through
 * untouched.
 */
export interface TenantStrategy<TContext = unknown> {
  identify(context: TContext): Promise<string | undefined>
}
