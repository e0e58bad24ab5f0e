/**
 * Compiles field specifications into a single key/value parser.
 *
 * A resolver accepts a `Map`, a plain object, or an array of `[key, value]`
 * pairs. Fields are resolved in specification order and the first failure
 * ends the parse.
 *
 * @example
 * ```typescript
 * const person = unwrap(
 *   compile([
 *     field('name', string()),
 *     field('age', integer(), { default: 21 }),
 *     field('email', string(), { optional: true, from: 'emailAddress' }),
 *   ])
 * );
 *
 * person({ name: 'Ada' });
 * // { success: true, value: { name: 'Ada', age: 21, email: { present: false } } }
 * ```
 *
 * @packageDocumentation
 */

import { domainError, wrap } from '../algebra/error.js';
import { absent, present } from '../algebra/option.js';
import { andThen, err, fold, mapOk, ok, type Result } from '../algebra/result.js';
import { isDictionary, isKeyValuePairs, pairsToMap, type Dictionary } from '../parser/shape.js';
import type { Parser } from '../parser/types.js';
import { logger as defaultLogger } from '../utils/logger.js';
import { Field } from './field.js';
import { fetchKey, keyLabel } from './lookup.js';
import type {
  FieldKey,
  FieldRecord,
  FieldSpec,
  RecordOf,
  ResolverOptions,
  SingleFieldRecordOf,
} from './types.js';

/**
 * Accepts a dictionary as-is and converts an array of pairs into a `Map`.
 *
 * @returns The dictionary, or `invalid_input` carrying the raw input.
 */
export function normalizeInput(input: unknown): Result<Dictionary> {
  if (Array.isArray(input)) {
    const values: readonly unknown[] = input;
    return isKeyValuePairs(values)
      ? ok(pairsToMap(values))
      : err(domainError('invalid_input', { input }));
  }
  if (isDictionary(input)) {
    return ok(input);
  }
  return err(domainError('invalid_input', { input }));
}

/**
 * Defines `key` as an enumerable own data property, so keys such as
 * `'__proto__'` never reach a setter.
 */
export function setOwn<T extends object>(record: T, key: FieldKey, value: unknown): T {
  return Object.defineProperty(record, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Copies the enumerable own properties of `source` onto `record` with
 * {@link setOwn}.
 */
export function assignOwn<T extends object>(record: T, source: object): T {
  return Reflect.ownKeys(source)
    .filter((key) => Object.prototype.propertyIsEnumerable.call(source, key))
    .reduce((acc, key) => setOwn(acc, key, Reflect.get(source, key)), record);
}

function parseFound(field: Field, value: unknown, dictionary: Dictionary): Result<unknown> {
  const result = field.parser(value);
  if (!result.success) {
    return err(
      wrap(result.error, domainError('failed_to_parse_field', { field: field.name, input: dictionary }))
    );
  }
  return ok(field.optional ? present(result.value) : result.value);
}

function resolveMissing(field: Field, dictionary: Dictionary): Result<unknown> {
  if (field.optional) {
    return ok(absent());
  }
  if (field.fallback.present) {
    return ok(field.fallback.value);
  }
  return err(domainError('field_not_found_in_input', { field: field.name, input: dictionary }));
}

function resolveField(field: Field, dictionary: Dictionary, textFallback: boolean): Result<unknown> {
  if (field.recurse) {
    return parseFound(field, dictionary, dictionary);
  }
  const found = fetchKey(dictionary, field.from, textFallback);
  return found.present ? parseFound(field, found.value, dictionary) : resolveMissing(field, dictionary);
}

/**
 * Runs validated fields against one input.
 */
export function runFields(
  fields: readonly Field[],
  input: unknown,
  textFallback: boolean
): Result<FieldRecord> {
  return andThen(normalizeInput(input), (dictionary) => {
    const record: Record<FieldKey, unknown> = {};
    return fold(fields, record, (acc, field) =>
      mapOk(resolveField(field, dictionary, textFallback), (value) => setOwn(acc, field.name, value))
    );
  });
}

/**
 * Validates every spec in order, stopping at the first invalid one.
 */
export function compileFields(specs: unknown): Result<Field[]> {
  if (!Array.isArray(specs)) {
    return err(domainError('not_a_list', { value: specs }));
  }
  const candidates: readonly unknown[] = specs;
  const fields: Field[] = [];
  return fold(candidates, fields, (acc, spec) =>
    mapOk(Field.fromSpec(spec), (field) => {
      acc.push(field);
      return acc;
    })
  );
}

/**
 * Compiles a list of field specifications into a resolver.
 *
 * Compilation fails with `not_a_list` when `specs` is not an array, and with
 * `invalid_field_spec` for the first spec that is malformed or combines two of
 * `optional`, `default` and `nullable`.
 *
 * The resolver fails with `invalid_input` for anything other than a
 * dictionary or an array of pairs, with `failed_to_parse_field` (wrapping the
 * parser's error) when a value is rejected, and with
 * `field_not_found_in_input` when a required key is missing.
 *
 * @param specs - Field specifications, resolved in order.
 * @param options - Key lookup and logging options.
 * @returns The compiled resolver.
 */
export function compile<Specs extends readonly FieldSpec[]>(
  specs: Specs,
  options?: ResolverOptions
): Result<Parser<RecordOf<Specs>>>;
export function compile(specs: unknown, options?: ResolverOptions): Result<Parser<FieldRecord>>;
export function compile(specs: unknown, options: ResolverOptions = {}): Result<Parser<FieldRecord>> {
  const log = options.logger ?? defaultLogger;
  const textFallback = options.stringKeyFallback ?? true;
  const fields = compileFields(specs);

  if (!fields.success) {
    log.debug('field_spec_rejected', { reason: fields.error.reason });
    return fields;
  }

  const compiled = fields.value;
  log.debug('resolver_compiled', { fields: compiled.map((field) => keyLabel(field.name)) });
  return ok((input: unknown) => runFields(compiled, input, textFallback));
}

/**
 * Compiles a single field specification into a one-key resolver.
 *
 * Optional and recursive semantics are stripped: the resolver only matches an
 * input that holds the key. A spec with a default also accepts a value equal
 * to that default, so the default can be supplied back explicitly.
 *
 * @example
 * ```typescript
 * const country = unwrap(compileOne(field('country', string(), { default: null })));
 * country({ country: null }); // { success: true, value: { country: null } }
 * country({}); // reason: 'field_not_found_in_input'
 * ```
 */
export function compileOne<S extends FieldSpec>(
  spec: S,
  options?: ResolverOptions
): Result<Parser<SingleFieldRecordOf<S>>>;
export function compileOne(spec: unknown, options?: ResolverOptions): Result<Parser<FieldRecord>>;
export function compileOne(spec: unknown, options: ResolverOptions = {}): Result<Parser<FieldRecord>> {
  const textFallback = options.stringKeyFallback ?? true;
  return mapOk(Field.fromSpec(spec), (field) => {
    const narrowed = field.forUpdate();
    return (input: unknown) => runFields([narrowed], input, textFallback);
  });
}
