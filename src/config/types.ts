/**
 * Settings types for fieldwise.toml.
 *
 * @packageDocumentation
 */

import type { AmbiguityPolicy } from '../record/types.js';

/**
 * Key lookup settings.
 */
export interface LookupSettings {
  /** Whether a symbol key missing from the input is retried by its description. */
  string_key_fallback: boolean;
}

/**
 * Partial update settings.
 */
export interface UpdateSettings {
  /** What happens when several fields accept one update parameter. */
  on_ambiguous_match: AmbiguityPolicy;
}

/**
 * Logging settings.
 */
export interface LoggingSettings {
  /** Emit debug entries for resolver and update compilation. */
  debug: boolean;
}

/**
 * Complete settings with every value resolved.
 */
export interface Settings {
  lookup: LookupSettings;
  update: UpdateSettings;
  logging: LoggingSettings;
}

/**
 * Settings where every section and value may be missing.
 */
export type PartialSettings = {
  [K in keyof Settings]?: Partial<Settings[K]>;
};
