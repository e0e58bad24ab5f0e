/**
 * Field specification types for key/value resolvers.
 *
 * @packageDocumentation
 */

import type { Option } from '../algebra/option.js';
import type { Parser } from '../parser/types.js';
import type { PropertyName } from '../parser/shape.js';
import type { Logger } from '../utils/logger.js';

/**
 * Name of an output field, or of the input key a field is read from.
 *
 * A symbol key is looked up verbatim first and then, if missing, by its
 * description, so `Symbol.for('age')` also finds an input key `'age'`.
 */
export type FieldKey = PropertyName;

/**
 * Options that relax or redirect how a field is resolved.
 *
 * `optional`, `default` and `nullable` are mutually exclusive; a resolver will
 * not compile a spec that combines any two of them.
 */
export interface FieldOptions {
  /** Input key to read. Defaults to the field's name. */
  readonly from?: FieldKey;
  /** Missing keys resolve to absent; found values are wrapped in present. */
  readonly optional?: boolean;
  /** Value used, without parsing, when the key is missing. */
  readonly default?: unknown;
  /** `null` is accepted in addition to the parser's domain. */
  readonly nullable?: boolean;
  /** The parser receives the whole input instead of one key's value. */
  readonly recurse?: boolean;
}

/**
 * Declarative description of one output field.
 *
 * @template N - The output key.
 * @template T - The type the parser produces.
 */
export interface FieldSpec<N extends FieldKey = FieldKey, T = unknown> extends FieldOptions {
  /** Output key of the resolved value. */
  readonly name: N;
  /** Parser applied to the located value. */
  readonly parser: Parser<T>;
}

/**
 * What a resolver produces: resolved values keyed by field name.
 */
export type FieldRecord = Readonly<Record<FieldKey, unknown>>;

/**
 * The value type a spec's parser produces.
 */
export type SpecValue<S> = S extends FieldSpec<FieldKey, infer T> ? T : never;

/**
 * The type a spec resolves to inside a record.
 */
export type FieldOutput<S> = S extends { readonly optional: true }
  ? Option<SpecValue<S>>
  : S extends { readonly nullable: true }
    ? SpecValue<S> | null
    : S extends { readonly default: infer D }
      ? SpecValue<S> | D
      : SpecValue<S>;

/**
 * The record type produced by a resolver compiled from `Specs`.
 *
 * @example
 * ```typescript
 * const specs = [field('name', string()), field('age', integer(), { optional: true })];
 * type Person = RecordOf<typeof specs>;
 * // { readonly name: string; readonly age: Option<number> }
 * ```
 */
export type RecordOf<Specs extends readonly FieldSpec[]> = {
  readonly [S in Specs[number] as S['name']]: FieldOutput<S>;
};

/**
 * The one-entry record a single-field resolver produces. Optional semantics
 * are stripped, so the value is never wrapped.
 */
export type SingleFieldRecordOf<S extends FieldSpec> = {
  readonly [K in S['name']]: S extends { readonly nullable: true }
    ? SpecValue<S> | null
    : S extends { readonly default: infer D }
      ? SpecValue<S> | D
      : SpecValue<S>;
};

/**
 * Options accepted when compiling a resolver.
 */
export interface ResolverOptions {
  /**
   * Whether a missing symbol key is retried by its description.
   * @defaultValue true
   */
  readonly stringKeyFallback?: boolean;

  /**
   * Receives debug entries about compilation. Parsing never logs.
   */
  readonly logger?: Logger;
}
