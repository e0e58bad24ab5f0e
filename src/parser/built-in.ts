/**
 * Parsers for primitive JavaScript values.
 *
 * Each factory returns a fresh parser; none coerces beyond what its name says.
 * `numericString`, `date` and `datetime` are the only ones that read text.
 *
 * @packageDocumentation
 */

import { domainError } from '../algebra/error.js';
import { andThen, err, ok, type Result } from '../algebra/result.js';
import type { Parser } from './types.js';

/**
 * Accepts safe and unsafe integers alike; rejects `1.5`, `NaN` and `'1'`.
 */
export function integer(): Parser<number> {
  return (input) =>
    typeof input === 'number' && Number.isInteger(input)
      ? ok(input)
      : err(domainError('not_an_integer'));
}

/**
 * Accepts finite numbers.
 */
export function number(): Parser<number> {
  return (input) =>
    typeof input === 'number' && Number.isFinite(input) ? ok(input) : err(domainError('not_a_number'));
}

export function string(): Parser<string> {
  return (input) => (typeof input === 'string' ? ok(input) : err(domainError('not_a_string')));
}

export function boolean(): Parser<boolean> {
  return (input) => (typeof input === 'boolean' ? ok(input) : err(domainError('not_a_boolean')));
}

/**
 * Accepts exactly `null`. `undefined` is not null.
 */
export function nil(): Parser<null> {
  return (input) => (input === null ? ok(null) : err(domainError('not_nil')));
}

/**
 * Accepts every input.
 */
export function any(): Parser<unknown> {
  return (input) => ok(input);
}

const NUMERIC_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parses decimal text such as `'42'`, `'-3.5'` or `'1e3'` into a number.
 *
 * Surrounding whitespace is not trimmed.
 */
export function numericString(): Parser<number> {
  return (input) => {
    if (typeof input !== 'string' || !NUMERIC_PATTERN.test(input)) {
      return err(domainError('not_a_numeric_string'));
    }
    const value = Number(input);
    return Number.isFinite(value) ? ok(value) : err(domainError('not_a_numeric_string'));
  };
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATETIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(\.\d+)?(Z|[+-]\d{2}:?\d{2})?$/;
const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const days = month === 2 && isLeapYear(year) ? 29 : (DAYS_IN_MONTH[month - 1] ?? 0);
  return day <= days;
}

function isValidTime(hour: number, minute: number, second: number): boolean {
  return hour < 24 && minute < 60 && second < 60;
}

function utcDate(year: number, month: number, day: number, time = [0, 0, 0, 0]): Date {
  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC.
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(time[0] ?? 0, time[1] ?? 0, time[2] ?? 0, time[3] ?? 0);
  return date;
}

function offsetMinutes(offset: string): number | undefined {
  if (offset === 'Z') {
    return 0;
  }
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  if (hours > 23 || minutes > 59) {
    return undefined;
  }
  return sign * (hours * 60 + minutes);
}

function isValidDateInstance(value: Date): boolean {
  return !Number.isNaN(value.getTime());
}

function parseDateText(text: string): Result<Date> {
  const match = DATE_PATTERN.exec(text);
  if (match === null) {
    return err(domainError('invalid_format'));
  }
  const [year, month, day] = match.slice(1, 4).map(Number);
  if (year === undefined || month === undefined || day === undefined) {
    return err(domainError('invalid_format'));
  }
  if (!isValidCalendarDate(year, month, day)) {
    return err(domainError('invalid_date'));
  }
  return ok(utcDate(year, month, day));
}

interface WallClock {
  readonly local: Date;
  readonly offset: string | undefined;
}

function parseWallClock(text: string): Result<WallClock> {
  const match = DATETIME_PATTERN.exec(text);
  if (match === null) {
    return err(domainError('invalid_format'));
  }
  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    return err(domainError('invalid_format'));
  }
  if (!isValidCalendarDate(year, month, day)) {
    return err(domainError('invalid_date'));
  }
  if (!isValidTime(hour, minute, second)) {
    return err(domainError('invalid_time'));
  }
  const fraction = match[7];
  const millis = fraction === undefined ? 0 : Number(fraction.slice(1, 4).padEnd(3, '0'));
  return ok({ local: utcDate(year, month, day, [hour, minute, second, millis]), offset: match[8] });
}

function parseDatetimeText(text: string): Result<Date> {
  return andThen(parseWallClock(text), ({ local, offset }) => {
    if (offset === undefined) {
      return err(domainError('missing_offset'));
    }
    const shift = offsetMinutes(offset);
    if (shift === undefined) {
      return err(domainError('invalid_format'));
    }
    return ok(new Date(local.getTime() - shift * 60_000));
  });
}

function parseNaiveDatetimeText(text: string): Result<Date> {
  return andThen(parseWallClock(text), ({ local, offset }) =>
    offset === undefined ? ok(local) : err(domainError('invalid_format'))
  );
}

/**
 * Accepts `Date` instances and `YYYY-MM-DD` strings (read as UTC midnight).
 *
 * @example
 * ```typescript
 * date()('1999-12-31'); // Date 1999-12-31T00:00:00.000Z
 * date()('19991231'); // reason: 'invalid_format'
 * date()('1999-12-32'); // reason: 'invalid_date'
 * date()(123456789); // reason: 'not_a_date'
 * ```
 */
export function date(): Parser<Date> {
  return (input) => {
    if (input instanceof Date) {
      return isValidDateInstance(input) ? ok(input) : err(domainError('invalid_date'));
    }
    if (typeof input === 'string') {
      return parseDateText(input);
    }
    return err(domainError('not_a_date'));
  };
}

/**
 * Accepts `Date` instances and ISO-8601 date-times that carry `Z` or an offset.
 *
 * @example
 * ```typescript
 * datetime()('1999-12-31 23:59:59Z'); // Date 1999-12-31T23:59:59.000Z
 * datetime()('1999-12-31 23:59:99Z'); // reason: 'invalid_time'
 * datetime()('1999-12-31 23:59:59'); // reason: 'missing_offset'
 * ```
 */
export function datetime(): Parser<Date> {
  return (input) => {
    if (input instanceof Date) {
      return isValidDateInstance(input) ? ok(input) : err(domainError('invalid_date'));
    }
    if (typeof input === 'string') {
      return parseDatetimeText(input);
    }
    return err(domainError('not_a_datetime'));
  };
}

/**
 * Accepts `Date` instances and ISO-8601 date-times without an offset. The wall
 * clock time is stored as UTC.
 *
 * @example
 * ```typescript
 * naiveDatetime()('1999-12-31 23:59:59'); // Date 1999-12-31T23:59:59.000Z
 * naiveDatetime()('1999-12-32 23:59:59'); // reason: 'invalid_date'
 * naiveDatetime()('1999-12-31 23:59:59Z'); // reason: 'invalid_format'
 * naiveDatetime()(123456789); // reason: 'not_a_naive_datetime'
 * ```
 */
export function naiveDatetime(): Parser<Date> {
  return (input) => {
    if (input instanceof Date) {
      return isValidDateInstance(input) ? ok(input) : err(domainError('invalid_date'));
    }
    if (typeof input === 'string') {
      return parseNaiveDatetimeText(input);
    }
    return err(domainError('not_a_naive_datetime'));
  };
}
