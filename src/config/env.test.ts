import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  mergeSettings,
  readEnvOverrides,
} from './env.js';
import { DEFAULT_SETTINGS } from './defaults.js';

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    it('should map each FIELDWISE_* variable onto its section', () => {
      const result = readEnvOverrides({
        FIELDWISE_STRING_KEY_FALLBACK: 'false',
        FIELDWISE_ON_AMBIGUOUS_MATCH: 'error',
        FIELDWISE_DEBUG: 'yes',
      });

      expect(result.overrides).toEqual({
        lookup: { string_key_fallback: false },
        update: { on_ambiguous_match: 'error' },
        logging: { debug: true },
      });
      expect(result.appliedVars).toEqual([
        'FIELDWISE_STRING_KEY_FALLBACK',
        'FIELDWISE_ON_AMBIGUOUS_MATCH',
        'FIELDWISE_DEBUG',
      ]);
      expect(result.errors).toEqual([]);
    });

    it('should ignore unset, empty and unrelated variables', () => {
      const result = readEnvOverrides({ FIELDWISE_DEBUG: '', HOME: '/home/test', OTHER: undefined });

      expect(result.overrides).toEqual({});
      expect(result.appliedVars).toEqual([]);
    });

    it('should coerce booleans case-insensitively and trim them', () => {
      expect(readEnvOverrides({ FIELDWISE_DEBUG: ' ON ' }).overrides.logging?.debug).toBe(true);
      expect(readEnvOverrides({ FIELDWISE_DEBUG: '0' }).overrides.logging?.debug).toBe(false);
    });

    it('should coerce policies case-insensitively', () => {
      const result = readEnvOverrides({ FIELDWISE_ON_AMBIGUOUS_MATCH: 'First' });

      expect(result.overrides.update?.on_ambiguous_match).toBe('first');
    });

    it('should throw EnvCoercionError for an invalid value', () => {
      expect(() => readEnvOverrides({ FIELDWISE_DEBUG: 'maybe' })).toThrow(EnvCoercionError);
      expect(() => readEnvOverrides({ FIELDWISE_ON_AMBIGUOUS_MATCH: 'last' })).toThrow(
        "Cannot coerce 'FIELDWISE_ON_AMBIGUOUS_MATCH' value 'last' to policy. Expected one of: first, error"
      );
    });

    it('should collect errors and keep valid values when asked', () => {
      const result = readEnvOverrides(
        { FIELDWISE_DEBUG: 'maybe', FIELDWISE_STRING_KEY_FALLBACK: 'no' },
        { collectErrors: true }
      );

      expect(result.overrides).toEqual({ lookup: { string_key_fallback: false } });
      expect(result.appliedVars).toEqual(['FIELDWISE_STRING_KEY_FALLBACK']);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]?.envVar).toBe('FIELDWISE_DEBUG');
      expect(result.errors[0]?.rawValue).toBe('maybe');
      expect(result.errors[0]?.expectedType).toBe('boolean');
    });

    it('should reject every string that names no policy', () => {
      fc.assert(
        fc.property(
          fc.string().filter((value) => {
            const normalized = value.trim().toLowerCase();
            return value !== '' && normalized !== 'first' && normalized !== 'error';
          }),
          (value) => {
            const result = readEnvOverrides(
              { FIELDWISE_ON_AMBIGUOUS_MATCH: value },
              { collectErrors: true }
            );
            return result.errors.length === 1 && result.overrides.update === undefined;
          }
        )
      );
    });
  });

  describe('applyEnvOverrides', () => {
    it('should give environment values precedence', () => {
      const settings = applyEnvOverrides(DEFAULT_SETTINGS, { FIELDWISE_ON_AMBIGUOUS_MATCH: 'error' });

      expect(settings).toEqual({
        lookup: { string_key_fallback: true },
        update: { on_ambiguous_match: 'error' },
        logging: { debug: false },
      });
    });

    it('should not modify the base settings', () => {
      applyEnvOverrides(DEFAULT_SETTINGS, { FIELDWISE_DEBUG: 'true' });

      expect(DEFAULT_SETTINGS.logging.debug).toBe(false);
    });
  });

  describe('mergeSettings', () => {
    it('should keep base values the partial does not mention', () => {
      expect(mergeSettings(DEFAULT_SETTINGS, { logging: {} })).toEqual(DEFAULT_SETTINGS);
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should document every supported variable', () => {
      const docs = getEnvVarDocumentation();

      expect(Object.keys(docs)).toEqual([
        'FIELDWISE_STRING_KEY_FALLBACK',
        'FIELDWISE_ON_AMBIGUOUS_MATCH',
        'FIELDWISE_DEBUG',
      ]);
      expect(docs.FIELDWISE_ON_AMBIGUOUS_MATCH?.type).toBe('policy');
    });
  });
});
