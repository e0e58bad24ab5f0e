/**
 * Partial updates validated by the same field specifications that build a
 * record.
 *
 * Compiling an update and applying it are separate steps: the parameters are
 * checked once, and the resulting function can be applied to any number of
 * instances.
 *
 * @packageDocumentation
 */

import { domainError } from '../algebra/error.js';
import { andThen, err, fold, mapOk, ok, type Result } from '../algebra/result.js';
import { keyLabel } from '../kv/lookup.js';
import { assignOwn, compileFields, normalizeInput, runFields } from '../kv/resolver.js';
import type { FieldKey, FieldRecord, ResolverOptions } from '../kv/types.js';
import { entriesOf } from '../parser/shape.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { AmbiguityPolicy, FieldUpdater, RecordClass, Update, UpdateOptions } from './types.js';

interface ParameterMatch {
  readonly name: FieldKey;
  readonly record: FieldRecord;
}

/**
 * Compiles a single-key resolver for every spec, stopping at the first
 * invalid one. Fails with `not_a_list` when `specs` is not an array.
 */
export function compileUpdaters(specs: unknown, options: ResolverOptions = {}): Result<FieldUpdater[]> {
  const textFallback = options.stringKeyFallback ?? true;
  return mapOk(compileFields(specs), (fields) =>
    fields.map((field): FieldUpdater => {
      const narrowed = field.forUpdate();
      return { name: field.name, parse: (input) => runFields([narrowed], input, textFallback) };
    })
  );
}

function describeKey(key: unknown): string {
  return typeof key === 'string' || typeof key === 'symbol' ? keyLabel(key) : String(key);
}

function matchParameter(
  updaters: readonly FieldUpdater[],
  key: unknown,
  value: unknown,
  policy: AmbiguityPolicy,
  log: Logger
): Result<FieldRecord> {
  const single = new Map<unknown, unknown>([[key, value]]);
  const matches = updaters.flatMap((updater): ParameterMatch[] => {
    const result = updater.parse(single);
    return result.success ? [{ name: updater.name, record: result.value }] : [];
  });

  const first = matches[0];
  if (first === undefined) {
    return err(domainError('invalid_parameter', { key, value }));
  }

  if (matches.length > 1) {
    const fields = matches.map((match) => match.name);
    log.debug('update_parameter_ambiguous', {
      key: describeKey(key),
      fields: fields.map(keyLabel),
      policy,
    });
    if (policy === 'error') {
      return err(domainError('ambiguous_parameter', { key, value, fields }));
    }
  }

  return ok(first.record);
}

function applyChanges<T extends object>(target: RecordClass<T>, changes: FieldRecord): Update<T> {
  return (instance) => {
    if (!(instance instanceof target) || instance.constructor !== target) {
      return err(domainError('struct_type_mismatch', { expecting: target, got: instance }));
    }
    return ok(assignOwn(assignOwn(new target(), instance), changes));
  };
}

/**
 * Validates update parameters against compiled field updaters.
 *
 * Every parameter is offered to every updater. A parameter no field accepts
 * fails with `invalid_parameter`; one that several fields accept is settled by
 * `onAmbiguousMatch`.
 */
export function planUpdate<T extends object>(
  updaters: readonly FieldUpdater[],
  target: RecordClass<T>,
  partial: unknown,
  options: UpdateOptions = {}
): Result<Update<T>> {
  const log = options.logger ?? defaultLogger;
  const policy = options.onAmbiguousMatch ?? 'first';

  return andThen(normalizeInput(partial), (dictionary) => {
    const entries = entriesOf(dictionary);
    const changes: Record<FieldKey, unknown> = {};
    const merged = fold(entries, changes, (acc, [key, value]): Result<Record<FieldKey, unknown>> =>
      mapOk(matchParameter(updaters, key, value, policy, log), (contribution) =>
        assignOwn(acc, contribution)
      )
    );
    return mapOk(merged, (validated) => {
      log.debug('update_compiled', { parameters: entries.map(([key]) => describeKey(key)) });
      return applyChanges(target, validated);
    });
  });
}

/**
 * Compiles a partial update for records of class `target`.
 *
 * @param specs - The specifications the record was built with. Anything but
 *   an array fails with `not_a_list`.
 * @param target - Class the update applies to.
 * @param partial - Parameters to change, as a dictionary or array of pairs.
 * @param options - Resolver options and the ambiguity policy.
 * @returns A function applying the update, or the first error found while
 *   compiling the specs or validating the parameters.
 *
 * @example
 * ```typescript
 * const update = unwrap(buildUpdate(petFields, Pet, { spotted: false }));
 * update(pooch); // { success: true, value: Pet { name: 'Pooch', spotted: false, price: 1000 } }
 * update(fish); // reason: 'struct_type_mismatch'
 * ```
 */
export function buildUpdate<T extends object>(
  specs: unknown,
  target: RecordClass<T>,
  partial: unknown,
  options: UpdateOptions = {}
): Result<Update<T>> {
  return andThen(compileUpdaters(specs, options), (updaters) =>
    planUpdate(updaters, target, partial, options)
  );
}
