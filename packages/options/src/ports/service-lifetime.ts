export const serviceLifetimes = ["singleton", "scoped", "transient"] as const

/**
 * How long a registered service instance is reused.
 *
 * - `singleton`: one instance per container
 * - `scoped`: one instance per scope (typically one request)
 * - `transient`: a new instance on every lookup
 */
export type ServiceLifetime = (typeof serviceLifetimes)[number]
