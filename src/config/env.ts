/**
 * Environment variable overrides for settings.
 *
 * FIELDWISE_* variables override values from the settings file, which
 * override the defaults.
 *
 * Override precedence: env > settings file > defaults
 *
 * @packageDocumentation
 */

import { AMBIGUITY_POLICIES, type AmbiguityPolicy } from '../record/types.js';
import type { PartialSettings, Settings } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

const TRUTHY = ['true', '1', 'yes', 'on'];
const FALSY = ['false', '0', 'no', 'off'];

/**
 * Coerces a string value to a boolean.
 *
 * Accepts 'true', '1', 'yes', 'on' and 'false', '0', 'no', 'off',
 * case-insensitively.
 *
 * @throws EnvCoercionError if the value is none of these.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  if (TRUTHY.includes(trimmed)) {
    return true;
  }
  if (FALSY.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...TRUTHY, ...FALSY].join(', ')}`
  );
}

/**
 * Coerces a string value to an ambiguity policy, case-insensitively.
 *
 * @throws EnvCoercionError if the value names no policy.
 */
function coerceToPolicy(value: string, envVar: string): AmbiguityPolicy {
  const trimmed = value.trim().toLowerCase();
  const policy = AMBIGUITY_POLICIES.find((candidate) => candidate === trimmed);

  if (policy === undefined) {
    throw new EnvCoercionError(
      envVar,
      value,
      'policy',
      `Cannot coerce '${envVar}' value '${value}' to policy. Expected one of: ${AMBIGUITY_POLICIES.join(', ')}`
    );
  }
  return policy;
}

interface EnvMapping {
  readonly type: 'boolean' | 'policy';
  readonly description: string;
  readonly apply: (overrides: PartialSettings, value: string, envVar: string) => void;
}

const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  FIELDWISE_STRING_KEY_FALLBACK: {
    type: 'boolean',
    description: 'Retry symbol keys by their description when missing (true/false)',
    apply: (overrides, value, envVar) => {
      overrides.lookup = { ...overrides.lookup, string_key_fallback: coerceToBoolean(value, envVar) };
    },
  },
  FIELDWISE_ON_AMBIGUOUS_MATCH: {
    type: 'policy',
    description: 'Policy for update parameters several fields accept (first, error)',
    apply: (overrides, value, envVar) => {
      overrides.update = { ...overrides.update, on_ambiguous_match: coerceToPolicy(value, envVar) };
    },
  },
  FIELDWISE_DEBUG: {
    type: 'boolean',
    description: 'Log resolver and update compilation at debug level (true/false)',
    apply: (overrides, value, envVar) => {
      overrides.logging = { ...overrides.logging, debug: coerceToBoolean(value, envVar) };
    },
  },
};

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial settings with values from environment variables. */
  overrides: PartialSettings;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads FIELDWISE_* environment variables into partial settings.
 *
 * Empty values are ignored. A value that cannot be coerced throws, unless
 * `collectErrors` is set, in which case it is skipped and reported in
 * `errors`.
 *
 * @param env - The environment to read from (defaults to process.env).
 * @param options - Options for reading environment variables.
 * @returns Overrides, the variables applied, and any coercion errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ FIELDWISE_DEBUG: 'yes' });
 * // result.overrides => { logging: { debug: true } }
 * // result.appliedVars => ['FIELDWISE_DEBUG']
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialSettings = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    // eslint-disable-next-line security/detect-object-injection -- safe: envVar comes from Object.entries iteration over controlled ENV_VAR_MAPPINGS
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges partial settings into complete settings.
 */
export function mergeSettings(base: Settings, partial: PartialSettings): Settings {
  return {
    lookup: { ...base.lookup, ...partial.lookup },
    update: { ...base.update, ...partial.update },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies environment variable overrides to settings.
 *
 * @param settings - Settings from a file or the defaults.
 * @param env - The environment to read from (defaults to process.env).
 * @returns New settings with environment values taking precedence.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(settings: Settings, env: EnvRecord = process.env): Settings {
  const { overrides } = readEnvOverrides(env);

  return mergeSettings(settings, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return Object.fromEntries(
    Object.entries(ENV_VAR_MAPPINGS).map(([envVar, mapping]) => [
      envVar,
      { description: mapping.description, type: mapping.type },
    ])
  );
}
