import { describe, expect, it } from 'vitest';
import { domainError } from '../algebra/error.js';
import { any, boolean, string } from '../parser/built-in.js';
import { field } from '../kv/spec.js';
import { buildNew } from './constructor.js';

class Plant {
  name = '';
  potted = false;
}

class Box {
  label = '';
}

const plantFields = [field('name', string()), field('potted', boolean())];

describe('buildNew', () => {
  it('should create an instance of the target class', () => {
    const result = buildNew(plantFields, Plant, { name: 'Fir', potted: false });

    expect(result).toStrictEqual({
      success: true,
      value: Object.assign(new Plant(), { name: 'Fir', potted: false }),
    });
    expect(result.success && result.value instanceof Plant).toBe(true);
  });

  it('should accept an array of pairs', () => {
    const result = buildNew(plantFields, Plant, [
      ['name', 'Cactus'],
      ['potted', true],
    ]);

    expect(result.success && result.value.potted).toBe(true);
  });

  it('should not build when a spec is invalid', () => {
    const spec = field('name', string(), { optional: true, nullable: true });

    expect(buildNew([spec], Plant, { name: 'Cactus', potted: true })).toEqual({
      success: false,
      error: domainError('invalid_field_spec', { spec }),
    });
  });

  it('should not build when a required field is missing', () => {
    expect(buildNew([field('name', string())], Plant, { potted: true })).toEqual({
      success: false,
      error: domainError('field_not_found_in_input', { field: 'name', input: { potted: true } }),
    });
  });

  it('should keep a __proto__ field as an own property', () => {
    const input = new Map<string, unknown>([
      ['label', 'a'],
      ['__proto__', { evil: true }],
    ]);
    const result = buildNew([field('label', string()), field('__proto__', any())], Box, input);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.value).toBeInstanceOf(Box);
    expect(result.value.label).toBe('a');
    expect(Object.getOwnPropertyDescriptor(result.value, '__proto__')?.value).toEqual({ evil: true });
    expect('evil' in result.value).toBe(false);
  });
});
