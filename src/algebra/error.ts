/**
 * Structured domain errors with causal chaining.
 *
 * Parsers never throw for malformed input; they return a DomainError. An outer
 * error can wrap the inner error that caused it, forming a chain that runs from
 * the outermost context down to the root cause.
 *
 * @packageDocumentation
 */

import { inspect } from 'node:util';
import { absent, present, type Option } from './option.js';

/**
 * Category of an error. Only expected, recoverable conditions exist today.
 */
export type ErrorKind = 'domain';

/**
 * Free-form, read-only context attached to an error.
 */
export type ErrorDetails = Readonly<Record<string, unknown>>;

/**
 * A failure value returned by parsers.
 */
export interface DomainError {
  /** Error category. */
  readonly kind: ErrorKind;
  /** Symbolic reason in snake_case, e.g. `not_an_integer`. */
  readonly reason: string;
  /** Context describing what failed and where. */
  readonly details: ErrorDetails;
  /** The error that caused this one, if it wraps another. */
  readonly causedBy: Option<DomainError>;
}

/**
 * Creates a domain error.
 *
 * @param reason - Symbolic reason for the failure.
 * @param details - Context for the failure.
 * @returns A new DomainError with no cause.
 *
 * @example
 * ```typescript
 * const e = domainError('not_an_integer', { value: 'x' });
 * reason(e); // 'not_an_integer'
 * ```
 */
export function domainError(reason: string, details: ErrorDetails = {}): DomainError {
  return { kind: 'domain', reason, details, causedBy: absent() };
}

export function reason(error: DomainError): string {
  return error.reason;
}

export function details(error: DomainError): ErrorDetails {
  return error.details;
}

export function causedBy(error: DomainError): Option<DomainError> {
  return error.causedBy;
}

/**
 * Returns a copy of `error` whose details have been transformed by `f`.
 *
 * The original error is left untouched.
 */
export function mapDetails(
  error: DomainError,
  f: (details: ErrorDetails) => ErrorDetails
): DomainError {
  return { ...error, details: f(error.details) };
}

/**
 * Annotates `outer` with `inner` as its cause.
 *
 * @param inner - The error that caused the failure.
 * @param outer - The error describing the enclosing context.
 * @returns A copy of `outer` whose `causedBy` is `present(inner)`.
 */
export function wrap(inner: DomainError, outer: DomainError): DomainError {
  return { ...outer, causedBy: present(inner) };
}

/**
 * Lists an error and every cause beneath it, outermost first.
 */
export function causalChain(error: DomainError): DomainError[] {
  const chain: DomainError[] = [];
  let current: Option<DomainError> = present(error);
  while (current.present) {
    chain.push(current.value);
    current = current.value.causedBy;
  }
  return chain;
}

/**
 * Follows the causal chain to its innermost error.
 */
export function rootCause(error: DomainError): DomainError {
  let current = error;
  while (current.causedBy.present) {
    current = current.causedBy.value;
  }
  return current;
}

function formatDetailValue(value: unknown): string {
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'function') {
    return value.name === '' ? '[parser]' : `[${value.name}]`;
  }
  return inspect(value, { depth: 2, breakLength: Infinity });
}

/**
 * Renders an error chain on one line, outermost first.
 *
 * The `input` detail is omitted since it repeats the whole parsed value.
 *
 * @example
 * ```typescript
 * formatError(wrap(domainError('not_an_integer'), domainError('failed_to_parse_field', { field: 'age' })));
 * // 'failed_to_parse_field (field: "age") <- not_an_integer'
 * ```
 */
export function formatError(error: DomainError): string {
  return causalChain(error)
    .map((link) => {
      const shown = Object.entries(link.details).filter(([key]) => key !== 'input');
      if (shown.length === 0) {
        return link.reason;
      }
      const rendered = shown.map(([key, value]) => `${key}: ${formatDetailValue(value)}`).join(', ');
      return `${link.reason} (${rendered})`;
    })
    .join(' <- ');
}

/**
 * Exception carrying a DomainError, for callers that prefer throwing at their
 * own boundary.
 */
export class ParseFailure extends Error {
  /** The domain error that was unwrapped. */
  public readonly error: DomainError;

  /**
   * Creates a new ParseFailure.
   *
   * @param error - The domain error being raised.
   */
  constructor(error: DomainError) {
    super(formatError(error));
    this.name = 'ParseFailure';
    this.error = error;
  }
}
