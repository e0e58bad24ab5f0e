import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { domainError } from '../algebra/error.js';
import {
  any,
  boolean,
  date,
  datetime,
  integer,
  naiveDatetime,
  nil,
  number,
  numericString,
  string,
} from './built-in.js';

function failure(reason: string): { success: false; error: ReturnType<typeof domainError> } {
  return { success: false, error: domainError(reason) };
}

function isoOf(input: unknown, parse: typeof date): string | undefined {
  const result = parse()(input);
  return result.success ? result.value.toISOString() : undefined;
}

describe('built-in parsers', () => {
  describe('integer', () => {
    it('should accept integers of any size', () => {
      expect(integer()(-4)).toEqual({ success: true, value: -4 });
      expect(integer()(2 ** 60)).toEqual({ success: true, value: 2 ** 60 });
    });

    it('should reject fractions, NaN and numeric text', () => {
      expect(integer()(1.5)).toEqual(failure('not_an_integer'));
      expect(integer()(Number.NaN)).toEqual(failure('not_an_integer'));
      expect(integer()('1')).toEqual(failure('not_an_integer'));
    });

    it('should accept every generated integer', () => {
      fc.assert(fc.property(fc.integer(), (n) => integer()(n).success));
    });
  });

  describe('number', () => {
    it('should accept finite numbers only', () => {
      expect(number()(1.25)).toEqual({ success: true, value: 1.25 });
      expect(number()(Number.POSITIVE_INFINITY)).toEqual(failure('not_a_number'));
      expect(number()(Number.NaN)).toEqual(failure('not_a_number'));
      expect(number()('1')).toEqual(failure('not_a_number'));
    });
  });

  describe('string and boolean', () => {
    it('should accept their own type only', () => {
      expect(string()('')).toEqual({ success: true, value: '' });
      expect(string()(0)).toEqual(failure('not_a_string'));
      expect(boolean()(false)).toEqual({ success: true, value: false });
      expect(boolean()('false')).toEqual(failure('not_a_boolean'));
    });
  });

  describe('nil and any', () => {
    it('should accept only null for nil', () => {
      expect(nil()(null)).toEqual({ success: true, value: null });
      expect(nil()(undefined)).toEqual(failure('not_nil'));
    });

    it('should accept everything for any', () => {
      fc.assert(
        fc.property(fc.anything(), (value) => {
          const result = any()(value);
          return result.success && Object.is(result.value, value);
        })
      );
    });
  });

  describe('numericString', () => {
    it('should read decimal and exponent notation', () => {
      expect(numericString()('42')).toEqual({ success: true, value: 42 });
      expect(numericString()('-3.5')).toEqual({ success: true, value: -3.5 });
      expect(numericString()('1e3')).toEqual({ success: true, value: 1000 });
      expect(numericString()('.5')).toEqual({ success: true, value: 0.5 });
    });

    it('should reject padded, non-numeric and overflowing text', () => {
      expect(numericString()(' 4')).toEqual(failure('not_a_numeric_string'));
      expect(numericString()('abc')).toEqual(failure('not_a_numeric_string'));
      expect(numericString()('1e400')).toEqual(failure('not_a_numeric_string'));
      expect(numericString()(42)).toEqual(failure('not_a_numeric_string'));
    });
  });

  describe('date', () => {
    it('should read YYYY-MM-DD as UTC midnight', () => {
      expect(isoOf('1999-12-31', date)).toBe('1999-12-31T00:00:00.000Z');
      expect(isoOf('2000-02-29', date)).toBe('2000-02-29T00:00:00.000Z');
    });

    it('should keep two-digit years literal', () => {
      const result = date()('0050-01-01');

      expect(result.success && result.value.getUTCFullYear()).toBe(50);
    });

    it('should pass valid Date instances through', () => {
      const instant = new Date('2021-06-01T00:00:00.000Z');

      expect(date()(instant)).toEqual({ success: true, value: instant });
    });

    it('should tell format errors from calendar errors', () => {
      expect(date()('19991231')).toEqual(failure('invalid_format'));
      expect(date()('1999-12-32')).toEqual(failure('invalid_date'));
      expect(date()('1900-02-29')).toEqual(failure('invalid_date'));
      expect(date()('2023-13-01')).toEqual(failure('invalid_date'));
      expect(date()(new Date(Number.NaN))).toEqual(failure('invalid_date'));
      expect(date()(123456789)).toEqual(failure('not_a_date'));
    });
  });

  describe('datetime', () => {
    it('should read Z and numeric offsets', () => {
      expect(isoOf('1999-12-31 23:59:59Z', datetime)).toBe('1999-12-31T23:59:59.000Z');
      expect(isoOf('2020-01-01T10:00:00+02:00', datetime)).toBe('2020-01-01T08:00:00.000Z');
      expect(isoOf('2020-01-01T10:00:00.5-0130', datetime)).toBe('2020-01-01T11:30:00.500Z');
    });

    it('should report the first problem found', () => {
      expect(datetime()('1999-12-31')).toEqual(failure('invalid_format'));
      expect(datetime()('1999-02-30 10:00:00Z')).toEqual(failure('invalid_date'));
      expect(datetime()('1999-12-31 23:59:99Z')).toEqual(failure('invalid_time'));
      expect(datetime()('1999-12-31 24:00:00Z')).toEqual(failure('invalid_time'));
      expect(datetime()('1999-12-31 23:59:59')).toEqual(failure('missing_offset'));
      expect(datetime()('2020-01-01T10:00:00+25:00')).toEqual(failure('invalid_format'));
      expect(datetime()(0)).toEqual(failure('not_a_datetime'));
    });
  });

  describe('naiveDatetime', () => {
    it('should keep the wall clock time as UTC', () => {
      expect(isoOf('1999-12-31 23:59:59', naiveDatetime)).toBe('1999-12-31T23:59:59.000Z');
      expect(isoOf('2020-01-01T10:00:00.25', naiveDatetime)).toBe('2020-01-01T10:00:00.250Z');
    });

    it('should pass valid Date instances through', () => {
      const instant = new Date(Date.UTC(2001, 0, 2, 3, 4, 5));

      expect(naiveDatetime()(instant)).toEqual({ success: true, value: instant });
      expect(naiveDatetime()(new Date(Number.NaN))).toEqual(failure('invalid_date'));
    });

    it('should report the first problem found', () => {
      expect(naiveDatetime()('1999-12-31')).toEqual(failure('invalid_format'));
      expect(naiveDatetime()('1999-12-32 23:59:59')).toEqual(failure('invalid_date'));
      expect(naiveDatetime()('1999-12-31 23:59:99')).toEqual(failure('invalid_time'));
      expect(naiveDatetime()('1999-12-31 23:59:59Z')).toEqual(failure('invalid_format'));
      expect(naiveDatetime()('2020-01-01T10:00:00+02:00')).toEqual(failure('invalid_format'));
      expect(naiveDatetime()(123456789)).toEqual(failure('not_a_naive_datetime'));
    });
  });
});
