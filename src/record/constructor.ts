/**
 * Builds typed records from key/value input.
 *
 * @packageDocumentation
 */

import { andThen, mapOk, type Result } from '../algebra/result.js';
import { assignOwn, compile } from '../kv/resolver.js';
import type { FieldRecord, FieldSpec, ResolverOptions } from '../kv/types.js';
import type { RecordClass } from './types.js';

/**
 * Creates an instance of `target` carrying the resolved fields.
 */
export function instantiate<T extends object>(target: RecordClass<T>, fields: FieldRecord): T {
  return assignOwn(new target(), fields);
}

/**
 * Compiles `specs`, resolves `input`, and builds a `target` from the result.
 *
 * Compilation and resolution errors are returned unchanged.
 *
 * @param specs - Field specifications for the record.
 * @param target - Class of the record to build.
 * @param input - A dictionary or an array of pairs.
 * @param options - Resolver options.
 * @returns The new record, or the first error encountered.
 *
 * @example
 * ```typescript
 * class Plant {
 *   name!: string;
 *   potted!: boolean;
 * }
 *
 * buildNew([field('name', string()), field('potted', boolean())], Plant, {
 *   name: 'Fir',
 *   potted: false,
 * });
 * // { success: true, value: Plant { name: 'Fir', potted: false } }
 * ```
 */
export function buildNew<T extends object>(
  specs: readonly FieldSpec[],
  target: RecordClass<T>,
  input: unknown,
  options: ResolverOptions = {}
): Result<T> {
  return andThen(compile(specs, options), (parser) =>
    mapOk(parser(input), (fields) => instantiate(target, fields))
  );
}
