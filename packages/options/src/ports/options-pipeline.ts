import type { OptionsName, OptionsType } from "./options-type"

/**
 * The tenant-unaware configuration pipeline options are built with.
 *
 * Construction is split in two so tenant customization can run in between:
 *
 * 1. `create`: construct and run the generic configure steps
 * 2. (tenant mutators run here)
 * 3. `complete`: run the post-configure steps and validate
 *
 * Either phase may throw or reject; the caller attaches the options slot to
 * the failure.
 */
export interface OptionsPipeline {
  create<T extends object>(type: OptionsType<T>, name: OptionsName): T | Promise<T>

  complete<T extends object>(
    type: OptionsType<T>,
    name: OptionsName,
    options: T,
  ): void | Promise<void>
}
