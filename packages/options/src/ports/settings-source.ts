/**
 * A source of raw settings values.
 *
 * Sources only load. Merging, coercion and validation happen in `loadSettings`;
 * later sources override earlier ones key by key.
 */
export interface SettingsSource {
  /** Provenance label, e.g. "env" or "dotenv:.env.local". */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
