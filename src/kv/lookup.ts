/**
 * Two-step key lookup: the key as given, then its textual form.
 *
 * @packageDocumentation
 */

import { absent, type Option } from '../algebra/option.js';
import { lookupKey, type Dictionary } from '../parser/shape.js';
import type { FieldKey } from './types.js';

/**
 * Returns the textual form of a symbol key, or undefined when the key is
 * already text or the symbol has no description.
 */
export function keyText(key: FieldKey): string | undefined {
  return typeof key === 'symbol' ? key.description : undefined;
}

/**
 * Renders a key for logs and messages.
 */
export function keyLabel(key: FieldKey): string {
  return typeof key === 'symbol' ? key.toString() : key;
}

/**
 * Finds `key` in `dictionary`.
 *
 * The key is tried verbatim first. If it is missing and is a described symbol,
 * the lookup is retried with the description, so `Symbol.for('age')` finds an
 * input keyed by `'age'`. The verbatim key wins when both are present.
 *
 * @param dictionary - The input being resolved.
 * @param key - The key to read.
 * @param textFallback - Whether to retry a symbol by its description.
 */
export function fetchKey(dictionary: Dictionary, key: FieldKey, textFallback: boolean): Option<unknown> {
  const found = lookupKey(dictionary, key);
  if (found.present || !textFallback) {
    return found;
  }
  const text = keyText(key);
  return text === undefined ? absent() : lookupKey(dictionary, text);
}
