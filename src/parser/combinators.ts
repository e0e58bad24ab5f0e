/**
 * Combinators that build parsers out of predicates and other parsers.
 *
 * Every combinator is fail-fast: the first failing element, key or value ends
 * the parse and its error is returned, enriched with the offending input.
 *
 * @packageDocumentation
 */

import { isDeepStrictEqual } from 'node:util';
import { domainError, mapDetails, type DomainError } from '../algebra/error.js';
import { absent, isOption, present, type Option } from '../algebra/option.js';
import { andThen, err, fold, mapOk, ok, type Result } from '../algebra/result.js';
import { entriesOf, isDictionary, isSet } from './shape.js';
import type { FailureSource, ParsedBy, Parser } from './types.js';

function isFailureFactory<E>(source: FailureSource<E>): source is (input: unknown) => E {
  return typeof source === 'function';
}

function resolveFailure<E>(source: FailureSource<E>, input: unknown): E {
  return isFailureFactory(source) ? source(input) : source;
}

/**
 * Creates a parser that accepts its input unchanged when `test` holds.
 *
 * Without `onFailure` a rejected input yields `predicate_not_satisfied` with
 * the predicate and the rejected value in its details.
 *
 * @example
 * ```typescript
 * const positive = predicate((x) => typeof x === 'number' && x > 0);
 * positive(3); // { success: true, value: 3 }
 * positive(-1); // reason: 'predicate_not_satisfied'
 *
 * const withError = predicate((x) => x !== '', domainError('blank'));
 * const withFactory = predicate((x) => x !== '', (x) => domainError('blank', { got: x }));
 * ```
 */
export function predicate<T>(test: (input: unknown) => input is T): Parser<T>;
export function predicate<T, E>(
  test: (input: unknown) => input is T,
  onFailure: FailureSource<E>
): Parser<T, E>;
export function predicate(test: (input: unknown) => boolean): Parser<unknown>;
export function predicate<E>(
  test: (input: unknown) => boolean,
  onFailure: FailureSource<E>
): Parser<unknown, E>;
export function predicate<E>(
  test: (input: unknown) => boolean,
  onFailure?: FailureSource<E>
): Parser<unknown, E | DomainError> {
  return (input) => {
    if (test(input)) {
      return ok(input);
    }
    if (onFailure === undefined) {
      return err(domainError('predicate_not_satisfied', { predicate: test, value: input }));
    }
    return err(resolveFailure(onFailure, input));
  };
}

/**
 * Creates a parser that accepts values deep-equal to one of `elements`.
 *
 * Without `onFailure` a rejected input yields `not_one_of`.
 */
export function oneOf<T>(elements: readonly T[]): Parser<T>;
export function oneOf<T, E>(elements: readonly T[], onFailure: FailureSource<E>): Parser<T, E>;
export function oneOf<T, E>(
  elements: readonly T[],
  onFailure?: FailureSource<E>
): Parser<T, E | DomainError> {
  return (input) => {
    for (const element of elements) {
      if (isDeepStrictEqual(element, input)) {
        return ok(element);
      }
    }
    if (onFailure === undefined) {
      return err(domainError('not_one_of', { elements, value: input }));
    }
    return err(resolveFailure(onFailure, input));
  };
}

function parseElements<T>(elements: Iterable<unknown>, parser: Parser<T>): Result<T[]> {
  const parsed: T[] = [];
  return fold(elements, parsed, (acc, element): Result<T[]> => {
    const result = parser(element);
    if (!result.success) {
      return err(mapDetails(result.error, (details) => ({ ...details, failed_element: element })));
    }
    acc.push(result.value);
    return ok(acc);
  });
}

/**
 * Creates a parser for arrays whose every element satisfies `parser`.
 *
 * @example
 * ```typescript
 * list(integer())([1, 2]); // { success: true, value: [1, 2] }
 * list(integer())([1, 'x', 3]); // reason: 'not_an_integer', details.failed_element: 'x'
 * list(integer())('1,2'); // reason: 'not_a_list'
 * ```
 */
export function list<T>(parser: Parser<T>): Parser<T[]> {
  return (input) => {
    if (!Array.isArray(input)) {
      return err(domainError('not_a_list', { value: input }));
    }
    const elements: readonly unknown[] = input;
    return parseElements(elements, parser);
  };
}

/**
 * Like {@link list}, but an empty array fails with `empty_list`.
 */
export function nonemptyList<T>(parser: Parser<T>): Parser<T[]> {
  const whole = list(parser);
  return (input) => {
    if (Array.isArray(input) && input.length === 0) {
      return err(domainError('empty_list'));
    }
    return whole(input);
  };
}

/**
 * Creates a parser for `Set`s whose every element satisfies `parser`.
 *
 * Output elements keep the input's insertion order.
 */
export function set<T>(parser: Parser<T>): Parser<Set<T>> {
  return (input) => {
    if (!isSet(input)) {
      return err(domainError('not_a_set', { value: input }));
    }
    return mapOk(parseElements(input, parser), (values) => new Set(values));
  };
}

/**
 * Creates a parser for dictionaries (a `Map` or a plain object).
 *
 * Keys are parsed in a first pass and values in a second, so an invalid key is
 * always reported before any invalid value. A key failure carries `failed_key`
 * and a value failure carries `failed_value`. If two keys parse to the same
 * key, the later entry wins.
 *
 * @example
 * ```typescript
 * const counts = mapOf(string(), integer());
 * counts({ apples: 3 }); // { success: true, value: Map { 'apples' => 3 } }
 * counts(new Map([[1, 'v']])); // reason: 'not_a_string', details.failed_key: 1
 * ```
 */
export function mapOf<K, V>(keyParser: Parser<K>, valueParser: Parser<V>): Parser<Map<K, V>> {
  return (input) => {
    if (!isDictionary(input)) {
      return err(domainError('not_a_map', { value: input }));
    }

    const rekeyed = fold(
      entriesOf(input),
      new Map<K, unknown>(),
      (acc, [key, value]): Result<Map<K, unknown>> => {
        const parsedKey = keyParser(key);
        if (!parsedKey.success) {
          return err(mapDetails(parsedKey.error, (details) => ({ ...details, failed_key: key })));
        }
        acc.set(parsedKey.value, value);
        return ok(acc);
      }
    );

    return andThen(rekeyed, (intermediate) =>
      fold(intermediate.entries(), new Map<K, V>(), (acc, [key, value]): Result<Map<K, V>> => {
        const parsedValue = valueParser(value);
        if (!parsedValue.success) {
          return err(
            mapDetails(parsedValue.error, (details) => ({ ...details, failed_value: value }))
          );
        }
        acc.set(key, parsedValue.value);
        return ok(acc);
      })
    );
  };
}

/**
 * Lifts `parser` to operate on an Option.
 *
 * A present value is parsed and re-wrapped; a parse failure is returned as-is.
 * Absent is passed through without calling `parser`.
 */
export function maybe<T, E>(parser: Parser<T, E>): Parser<Option<T>, E | DomainError> {
  return (input) => {
    if (!isOption(input)) {
      return err(domainError('not_an_option', { value: input }));
    }
    if (!input.present) {
      return ok(absent());
    }
    return mapOk(parser(input.value), (value) => present(value));
  };
}

/**
 * Tries each parser in order and returns the first success.
 *
 * When none applies the error is `no_parser_applies`, carrying the input and
 * the parsers that were tried.
 *
 * @example
 * ```typescript
 * const idOrName = union([integer(), string()]);
 * idOrName(7); // { success: true, value: 7 }
 * idOrName(true); // reason: 'no_parser_applies'
 * ```
 */
export function union<Ps extends readonly Parser<unknown, unknown>[]>(
  parsers: Ps
): Parser<ParsedBy<Ps[number]>>;
export function union(parsers: readonly Parser<unknown, unknown>[]): Parser<unknown> {
  return (input) => {
    for (const parser of parsers) {
      const result = parser(input);
      if (result.success) {
        return ok(result.value);
      }
    }
    return err(domainError('no_parser_applies', { input, parsers }));
  };
}

/**
 * Maps the value produced by `parser`.
 */
export function transform<T, U, E>(parser: Parser<T, E>, f: (value: T) => U): Parser<U, E> {
  return (input) => mapOk(parser(input), f);
}
