import { describe, expect, it } from 'vitest';
import { domainError } from '../algebra/error.js';
import { absent, present } from '../algebra/option.js';
import { integer } from '../parser/built-in.js';
import { Field } from './field.js';
import { field } from './spec.js';

describe('Field', () => {
  describe('fromSpec', () => {
    it('should default the source key to the name', () => {
      const result = Field.fromSpec(field('age', integer()));

      expect(result.success && result.value.from).toBe('age');
      expect(result.success && result.value.fallback).toEqual(absent());
    });

    it('should record an explicit undefined default as present', () => {
      const result = Field.fromSpec(field('age', integer(), { default: undefined }));

      expect(result.success && result.value.fallback).toEqual(present(undefined));
    });

    it('should produce frozen fields', () => {
      const result = Field.fromSpec(field('age', integer()));

      expect(result.success && Object.isFrozen(result.value)).toBe(true);
    });

    it.each([
      ['a non-object', 'age'],
      ['a numeric name', { name: 1, parser: integer() }],
      ['a parser that is not a function', { name: 'age', parser: 'integer' }],
      ['a numeric source key', { name: 'age', parser: integer(), from: 2 }],
      ['a non-boolean flag', { name: 'age', parser: integer(), optional: 'yes' }],
      ['nullable with optional', { name: 'age', parser: integer(), nullable: true, optional: true }],
      ['nullable with default', { name: 'age', parser: integer(), nullable: true, default: 0 }],
    ])('should reject %s', (_label, spec) => {
      expect(Field.fromSpec(spec)).toEqual({
        success: false,
        error: domainError('invalid_field_spec', { spec }),
      });
    });

    it('should allow recurse alongside any one exclusive option', () => {
      expect(Field.fromSpec(field('p', integer(), { recurse: true, optional: true })).success).toBe(true);
    });
  });

  describe('forUpdate', () => {
    it('should drop optional, default and recurse', () => {
      const result = Field.fromSpec(field('age', integer(), { default: 21, recurse: true }));
      const narrowed = result.success ? result.value.forUpdate() : undefined;

      expect(narrowed?.optional).toBe(false);
      expect(narrowed?.recurse).toBe(false);
      expect(narrowed?.fallback).toEqual(absent());
      expect(narrowed?.parser(21)).toEqual({ success: true, value: 21 });
    });

    it('should accept the default value alongside the parser domain', () => {
      const result = Field.fromSpec(field('age', integer(), { default: 'unknown' }));
      const narrowed = result.success ? result.value.forUpdate() : undefined;

      expect(narrowed?.parser('unknown')).toEqual({ success: true, value: 'unknown' });
      expect(narrowed?.parser(5)).toEqual({ success: true, value: 5 });
      expect(narrowed?.parser('other').success).toBe(false);
    });
  });
});
