/**
 * Types for building and updating typed records.
 *
 * @packageDocumentation
 */

import type { Result } from '../algebra/result.js';
import type { Parser } from '../parser/types.js';
import type { FieldKey, FieldRecord, FieldSpec, ResolverOptions } from '../kv/types.js';

/**
 * A record type: a class whose instances are built by assigning resolved
 * fields onto `new Target()`.
 *
 * @example
 * ```typescript
 * class Plant {
 *   name!: string;
 *   potted!: boolean;
 * }
 * ```
 */
export type RecordClass<T extends object> = new () => T;

/**
 * How an update parameter accepted by more than one field is handled.
 *
 * - `first`: the first matching field in specification order wins
 * - `error`: the update fails with `ambiguous_parameter`
 */
export const AMBIGUITY_POLICIES = ['first', 'error'] as const;

export type AmbiguityPolicy = (typeof AMBIGUITY_POLICIES)[number];

/**
 * Options accepted when compiling an update.
 */
export interface UpdateOptions extends ResolverOptions {
  /**
   * Policy for a parameter that several fields accept.
   * @defaultValue 'first'
   */
  readonly onAmbiguousMatch?: AmbiguityPolicy;
}

/**
 * Applies a compiled partial update to an existing record.
 *
 * Returns a new instance; the original is never modified. Fails with
 * `struct_type_mismatch` when the instance is not exactly of the target class.
 */
export type Update<T> = (instance: unknown) => Result<T>;

/**
 * One field's single-key resolver, used to recognise update parameters.
 */
export interface FieldUpdater {
  /** Output key of the field. */
  readonly name: FieldKey;
  /** Resolver for a one-entry input holding the field's key. */
  readonly parse: Parser<FieldRecord>;
}

/**
 * A record type bound to its field specifications, compiled once.
 */
export interface RecordDefinition<T extends object> {
  /** The class instances are built from. */
  readonly target: RecordClass<T>;
  /** The specifications both operations are compiled from. */
  readonly specs: readonly FieldSpec[];
  /** Builds a new record from complete input. */
  parse(input: unknown): Result<T>;
  /** Compiles a partial update from the given parameters. */
  update(partial: unknown): Result<Update<T>>;
}
