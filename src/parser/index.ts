/**
 * Parser contract, combinators and built-in parsers.
 *
 * @packageDocumentation
 */

export type { FailureOf, FailureSource, ParsedBy, Parser } from './types.js';
export {
  predicate,
  oneOf,
  list,
  nonemptyList,
  set,
  mapOf,
  maybe,
  union,
  transform,
} from './combinators.js';
export {
  integer,
  number,
  string,
  boolean,
  nil,
  any,
  numericString,
  date,
  datetime,
  naiveDatetime,
} from './built-in.js';
export {
  type Dictionary,
  type KeyValuePair,
  type PropertyName,
  type RecordObject,
  entriesOf,
  isDictionary,
  isKeyValuePairs,
  isMap,
  isRecordObject,
  isSet,
  lookupKey,
} from './shape.js';
