/**
 * Key/value resolvers compiled from field specifications.
 *
 * @packageDocumentation
 */

export type {
  FieldKey,
  FieldOptions,
  FieldOutput,
  FieldRecord,
  FieldSpec,
  RecordOf,
  ResolverOptions,
  SingleFieldRecordOf,
  SpecValue,
} from './types.js';
export { field } from './spec.js';
export { Field } from './field.js';
export { fetchKey, keyLabel, keyText } from './lookup.js';
export { compile, compileOne, compileFields, normalizeInput, runFields } from './resolver.js';
