/**
 * Default settings.
 *
 * @packageDocumentation
 */

import type { LoggingSettings, LookupSettings, Settings, UpdateSettings } from './types.js';

export const DEFAULT_LOOKUP: LookupSettings = {
  string_key_fallback: true,
};

/**
 * The first matching field wins, which keeps updates working when two fields
 * read the same key.
 */
export const DEFAULT_UPDATE: UpdateSettings = {
  on_ambiguous_match: 'first',
};

export const DEFAULT_LOGGING: LoggingSettings = {
  debug: false,
};

/**
 * Settings used when no file or environment variable says otherwise.
 */
export const DEFAULT_SETTINGS: Settings = {
  lookup: DEFAULT_LOOKUP,
  update: DEFAULT_UPDATE,
  logging: DEFAULT_LOGGING,
};
