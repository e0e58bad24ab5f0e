/**
 * Presence/absence container.
 *
 * Optional fields resolve to an Option rather than to `undefined`, so a record
 * can tell "the input did not mention this key" apart from "the input supplied
 * an empty value".
 *
 * @packageDocumentation
 */

/**
 * A value that is either present or absent.
 */
export type Option<T> =
  | {
      readonly present: true;
      readonly value: T;
    }
  | {
      readonly present: false;
    };

const ABSENT: Option<never> = Object.freeze({ present: false });

/**
 * Wraps a value as present.
 *
 * @param value - The value to wrap.
 * @returns A present Option holding `value`.
 */
export function present<T>(value: T): Option<T> {
  return { present: true, value };
}

/**
 * Returns the absent Option.
 */
export function absent<T = never>(): Option<T> {
  return ABSENT;
}

export function isPresent<T>(option: Option<T>): option is { readonly present: true; readonly value: T } {
  return option.present;
}

export function isAbsent<T>(option: Option<T>): option is { readonly present: false } {
  return !option.present;
}

/**
 * Checks whether an arbitrary value has the shape of an Option.
 *
 * @param value - Value to inspect.
 * @returns True for `{ present: false }` and for `{ present: true, value }`.
 */
export function isOption(value: unknown): value is Option<unknown> {
  if (typeof value !== 'object' || value === null || !('present' in value)) {
    return false;
  }
  if (value.present === false) {
    return true;
  }
  return value.present === true && 'value' in value;
}

/**
 * Applies `f` to a present value; absent stays absent.
 *
 * @example
 * ```typescript
 * mapOption(present(2), (n) => n * 10); // { present: true, value: 20 }
 * mapOption(absent<number>(), (n) => n * 10); // { present: false }
 * ```
 */
export function mapOption<T, U>(option: Option<T>, f: (value: T) => U): Option<U> {
  return option.present ? present(f(option.value)) : absent();
}

/**
 * Extracts a present value, or returns `fallback` when absent.
 */
export function getOrElse<T>(option: Option<T>, fallback: T): T {
  return option.present ? option.value : fallback;
}
