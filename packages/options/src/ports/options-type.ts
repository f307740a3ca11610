/**
 * Identifies an options type. Options are plain mutable classes with a
 * no-argument constructor; the constructor itself is the type identifier.
 *
 * @example
 * ```ts
 * class BillingOptions {
 *   planName = "free"
 *   seats = 1
 * }
 *
 * const billing: OptionsType<BillingOptions> = BillingOptions
 * ```
 */
export type OptionsType<T extends object = object> = new () => T

/**
 * Discriminates independently configured instances of one options type.
 */
export type OptionsName = string

/** Name of the unnamed instance. */
export const DEFAULT_OPTIONS_NAME: OptionsName = ""
