/**
 * Typed record construction and partial updates.
 *
 * @packageDocumentation
 */

export type {
  AmbiguityPolicy,
  FieldUpdater,
  RecordClass,
  RecordDefinition,
  Update,
  UpdateOptions,
} from './types.js';
export { AMBIGUITY_POLICIES } from './types.js';
export { buildNew, instantiate } from './constructor.js';
export { buildUpdate, compileUpdaters, planUpdate } from './update.js';
export { defineRecord } from './definition.js';
