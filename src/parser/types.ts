/**
 * The parser contract.
 *
 * @packageDocumentation
 */

import type { DomainError } from '../algebra/error.js';
import type { Result } from '../algebra/result.js';

/**
 * A pure function from any input to a typed success or an error.
 *
 * @template T - Type of a successfully parsed value.
 * @template E - Type of the failure, a DomainError unless a caller supplies its own.
 */
export type Parser<T, E = DomainError> = (input: unknown) => Result<T, E>;

/**
 * The success type of a parser.
 */
export type ParsedBy<P> = P extends Parser<infer T, unknown> ? T : never;

/**
 * The failure type of a parser.
 */
export type FailureOf<P> = P extends Parser<unknown, infer E> ? E : never;

/**
 * What a parser reports when a test fails: a fixed error, or a function that
 * builds one from the rejected input.
 */
export type FailureSource<E> = E | ((input: unknown) => E);
