/**
 * Builder for field specifications that keeps literal names and option flags,
 * so resolvers can infer the record type they produce.
 *
 * @packageDocumentation
 */

import type { Parser } from '../parser/types.js';
import type { FieldKey, FieldOptions, FieldSpec } from './types.js';

/**
 * Declares a field.
 *
 * Nothing is validated here; validation happens when the spec is compiled.
 *
 * @param name - Output key.
 * @param parser - Parser for the field's value.
 * @param options - `from`, `optional`, `default`, `nullable`, `recurse`.
 *
 * @example
 * ```typescript
 * field('username', string());
 * field('birthday', date(), { optional: true });
 * field('country', string(), { default: 'Canada' });
 * field('country', string(), { from: 'countryName' });
 * field('point', pointParser, { recurse: true });
 * ```
 */
export function field<N extends FieldKey, T>(name: N, parser: Parser<T>): FieldSpec<N, T>;
export function field<N extends FieldKey, T, O extends FieldOptions>(
  name: N,
  parser: Parser<T>,
  options: O
): FieldSpec<N, T> & O;
export function field(name: FieldKey, parser: Parser<unknown>, options: FieldOptions = {}): FieldSpec {
  return { ...options, name, parser };
}
