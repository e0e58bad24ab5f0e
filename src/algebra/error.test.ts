import { describe, expect, it } from 'vitest';
import { absent, present } from './option.js';
import {
  causalChain,
  causedBy,
  details,
  domainError,
  formatError,
  mapDetails,
  ParseFailure,
  reason,
  rootCause,
  wrap,
} from './error.js';

describe('DomainError', () => {
  it('should start with no cause and empty details', () => {
    const error = domainError('not_a_string');

    expect(error).toEqual({ kind: 'domain', reason: 'not_a_string', details: {}, causedBy: absent() });
    expect(reason(error)).toBe('not_a_string');
    expect(details(error)).toEqual({});
    expect(causedBy(error)).toEqual({ present: false });
  });

  it('should map details without modifying the original', () => {
    const original = domainError('not_an_integer', { value: 'x' });
    const mapped = mapDetails(original, (d) => ({ ...d, failed_element: 'x' }));

    expect(mapped.details).toEqual({ value: 'x', failed_element: 'x' });
    expect(original.details).toEqual({ value: 'x' });
  });

  describe('causal chains', () => {
    const root = domainError('not_an_integer');
    const middle = wrap(root, domainError('failed_to_parse_field', { field: 'age' }));
    const outer = wrap(middle, domainError('failed_to_parse_field', { field: 'person' }));

    it('should attach the inner error as the cause', () => {
      expect(middle.causedBy).toEqual(present(root));
      expect(middle.reason).toBe('failed_to_parse_field');
    });

    it('should list errors outermost first', () => {
      expect(causalChain(outer).map(reason)).toEqual([
        'failed_to_parse_field',
        'failed_to_parse_field',
        'not_an_integer',
      ]);
      expect(causalChain(root)).toEqual([root]);
    });

    it('should find the root cause', () => {
      expect(rootCause(outer)).toBe(root);
      expect(rootCause(root)).toBe(root);
    });
  });

  describe('formatError', () => {
    it('should render the chain on one line', () => {
      const error = wrap(
        domainError('not_an_integer'),
        domainError('failed_to_parse_field', { field: 'age', input: { age: 'x' } })
      );

      expect(formatError(error)).toBe('failed_to_parse_field (field: "age") <- not_an_integer');
    });

    it('should render numbers, symbols and functions', () => {
      function isEven(): boolean {
        return true;
      }
      const error = domainError('predicate_not_satisfied', {
        predicate: isEven,
        value: 3,
        key: Symbol('id'),
      });

      expect(formatError(error)).toBe(
        'predicate_not_satisfied (predicate: [isEven], value: 3, key: Symbol(id))'
      );
    });
  });

  describe('ParseFailure', () => {
    it('should carry the error and a formatted message', () => {
      const error = domainError('field_not_found_in_input', { field: 'name', input: {} });
      const failure = new ParseFailure(error);

      expect(failure).toBeInstanceOf(Error);
      expect(failure.name).toBe('ParseFailure');
      expect(failure.message).toBe('field_not_found_in_input (field: "name")');
      expect(failure.error).toBe(error);
    });
  });
});
