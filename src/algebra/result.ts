/**
 * Success/failure container used by every parser.
 *
 * @packageDocumentation
 */

import { ParseFailure, type DomainError } from './error.js';

/**
 * Outcome of a parse: either a value or an error.
 */
export type Result<T, E = DomainError> =
  | {
      readonly success: true;
      readonly value: T;
    }
  | {
      readonly success: false;
      readonly error: E;
    };

export function ok<T>(value: T): Result<T, never> {
  return { success: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { readonly success: true; readonly value: T } {
  return result.success;
}

export function isErr<T, E>(result: Result<T, E>): result is { readonly success: false; readonly error: E } {
  return !result.success;
}

/**
 * Transforms the value of a successful result.
 */
export function mapOk<T, U, E>(result: Result<T, E>, f: (value: T) => U): Result<U, E> {
  return result.success ? ok(f(result.value)) : result;
}

/**
 * Transforms the error of a failed result.
 */
export function mapErr<T, E, F>(result: Result<T, E>, f: (error: E) => F): Result<T, F> {
  return result.success ? result : err(f(result.error));
}

/**
 * Chains a computation that may itself fail.
 *
 * @param result - The result to continue from.
 * @param f - Called with the value when `result` succeeded.
 * @returns The result of `f`, or the original failure.
 */
export function andThen<T, U, E, F>(
  result: Result<T, E>,
  f: (value: T) => Result<U, F>
): Result<U, E | F> {
  return result.success ? f(result.value) : result;
}

/**
 * Reduces `items` into an accumulator, stopping at the first failure.
 *
 * @param items - Items to visit in iteration order.
 * @param initial - Starting accumulator.
 * @param step - Produces the next accumulator, or an error that ends the fold.
 * @returns The final accumulator, or the first error returned by `step`.
 *
 * @example
 * ```typescript
 * fold([1, 2, 3], 0, (sum, n) => (n > 2 ? err('too_big') : ok(sum + n)));
 * // { success: false, error: 'too_big' }
 * ```
 */
export function fold<I, A, E>(
  items: Iterable<I>,
  initial: A,
  step: (acc: A, item: I) => Result<A, E>
): Result<A, E> {
  let acc = initial;
  for (const item of items) {
    const next = step(acc, item);
    if (!next.success) {
      return next;
    }
    acc = next.value;
  }
  return ok(acc);
}

/**
 * Returns the value of a successful result, or throws a ParseFailure.
 *
 * @throws ParseFailure carrying the error when `result` failed.
 */
export function unwrap<T>(result: Result<T, DomainError>): T {
  if (!result.success) {
    throw new ParseFailure(result.error);
  }
  return result.value;
}
