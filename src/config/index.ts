/**
 * Settings for fieldwise.toml parsing and environment overrides.
 *
 * Override precedence: env > settings file > defaults
 *
 * @packageDocumentation
 */

export { loadSettings, parseSettings } from './parser.js';
export type {
  LoggingSettings,
  LookupSettings,
  PartialSettings,
  Settings,
  UpdateSettings,
} from './types.js';
export { DEFAULT_LOGGING, DEFAULT_LOOKUP, DEFAULT_SETTINGS, DEFAULT_UPDATE } from './defaults.js';
export {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  mergeSettings,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { resolverOptions } from './options.js';
