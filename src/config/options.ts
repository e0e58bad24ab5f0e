/**
 * Turns settings into the options resolvers and updates take.
 *
 * @packageDocumentation
 */

import type { UpdateOptions } from '../record/types.js';
import { Logger } from '../utils/logger.js';
import type { Settings } from './types.js';

/**
 * Maps settings onto resolver and update options, with a logger whose debug
 * output follows `logging.debug`.
 *
 * @example
 * ```typescript
 * const options = resolverOptions(applyEnvOverrides(DEFAULT_SETTINGS));
 * const person = compile(personFields, options);
 * ```
 */
export function resolverOptions(settings: Settings): UpdateOptions {
  return {
    stringKeyFallback: settings.lookup.string_key_fallback,
    onAmbiguousMatch: settings.update.on_ambiguous_match,
    logger: new Logger({ component: 'fieldwise', debugMode: settings.logging.debug }),
  };
}
