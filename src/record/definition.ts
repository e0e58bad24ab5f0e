/**
 * Binds a record class to its field specifications.
 *
 * @packageDocumentation
 */

import { andThen, mapOk, type Result } from '../algebra/result.js';
import { compile } from '../kv/resolver.js';
import type { FieldSpec } from '../kv/types.js';
import { instantiate } from './constructor.js';
import type { RecordClass, RecordDefinition, UpdateOptions } from './types.js';
import { compileUpdaters, planUpdate } from './update.js';

/**
 * Compiles the resolver and the field updaters for `target` once, so that
 * building and updating records skips spec validation.
 *
 * @example
 * ```typescript
 * const pets = unwrap(defineRecord(Pet, [field('name', string()), field('spotted', boolean())]));
 * const pooch = unwrap(pets.parse({ name: 'Pooch', spotted: true }));
 * const update = unwrap(pets.update({ spotted: false }));
 * update(pooch);
 * ```
 */
export function defineRecord<T extends object>(
  target: RecordClass<T>,
  specs: readonly FieldSpec[],
  options: UpdateOptions = {}
): Result<RecordDefinition<T>> {
  return andThen(compile(specs, options), (parser) =>
    mapOk(compileUpdaters(specs, options), (updaters) => {
      const definition: RecordDefinition<T> = {
        target,
        specs,
        parse: (input: unknown) => mapOk(parser(input), (fields) => instantiate(target, fields)),
        update: (partial: unknown) => planUpdate(updaters, target, partial, options),
      };
      return definition;
    })
  );
}
