/**
 * Runtime shape checks for the containers parsers accept.
 *
 * Plain objects are read through their own properties only, so keys such as
 * `__proto__` or `constructor` never resolve to something inherited.
 *
 * @packageDocumentation
 */

import { absent, present, type Option } from '../algebra/option.js';

/**
 * A key usable on a plain object.
 */
export type PropertyName = string | symbol;

/**
 * A plain object viewed as a read-only string/symbol keyed record.
 */
export type RecordObject = Readonly<Record<PropertyName, unknown>>;

/**
 * Any associative container a parser can read keys from.
 */
export type Dictionary = ReadonlyMap<unknown, unknown> | RecordObject;

/**
 * A `[key, value]` tuple as found in an array of pairs.
 */
export type KeyValuePair = readonly [PropertyName, unknown];

export function isMap(value: unknown): value is ReadonlyMap<unknown, unknown> {
  return value instanceof Map;
}

export function isSet(value: unknown): value is ReadonlySet<unknown> {
  return value instanceof Set;
}

export function isPropertyName(value: unknown): value is PropertyName {
  return typeof value === 'string' || typeof value === 'symbol';
}

/**
 * Checks for a non-array, non-collection object.
 */
export function isRecordObject(value: unknown): value is RecordObject {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Map) &&
    !(value instanceof Set)
  );
}

export function isDictionary(value: unknown): value is Dictionary {
  return isMap(value) || isRecordObject(value);
}

function isKeyValuePair(value: unknown): value is KeyValuePair {
  return Array.isArray(value) && value.length === 2 && isPropertyName(value[0]);
}

/**
 * Checks that every element of `values` is a `[key, value]` pair.
 *
 * An empty array qualifies.
 */
export function isKeyValuePairs(values: readonly unknown[]): values is readonly KeyValuePair[] {
  return values.every(isKeyValuePair);
}

/**
 * Builds a Map from pairs; a repeated key keeps its last value.
 */
export function pairsToMap(pairs: readonly KeyValuePair[]): Map<PropertyName, unknown> {
  return new Map<PropertyName, unknown>(pairs);
}

function ownKeys(record: RecordObject): PropertyName[] {
  const symbols = Object.getOwnPropertySymbols(record).filter((symbol) =>
    Object.prototype.propertyIsEnumerable.call(record, symbol)
  );
  return [...Object.keys(record), ...symbols];
}

/**
 * Lists the entries of a dictionary in insertion order.
 */
export function entriesOf(dictionary: Dictionary): [unknown, unknown][] {
  if (isMap(dictionary)) {
    return [...dictionary.entries()];
  }
  const record: RecordObject = dictionary;
  // eslint-disable-next-line security/detect-object-injection -- safe: key comes from the record's own keys
  return ownKeys(record).map((key): [unknown, unknown] => [key, record[key]]);
}

/**
 * Looks up `key` in a dictionary without consulting the prototype chain.
 *
 * @returns The stored value, or absent when the key is not an own key.
 */
export function lookupKey(dictionary: Dictionary, key: unknown): Option<unknown> {
  if (isMap(dictionary)) {
    return dictionary.has(key) ? present(dictionary.get(key)) : absent();
  }
  if (!isPropertyName(key) || !Object.prototype.hasOwnProperty.call(dictionary, key)) {
    return absent();
  }
  // eslint-disable-next-line security/detect-object-injection -- safe: own property checked above
  return present(dictionary[key]);
}
