/**
 * TOML settings parser for fieldwise.toml.
 *
 * Sections are validated by resolvers compiled from field specifications, so
 * a bad value fails with the same causal chain any other input would.
 *
 * @packageDocumentation
 */

import { readFile } from 'node:fs/promises';
import * as TOML from '@iarna/toml';
import { domainError } from '../algebra/error.js';
import { andThen, err, mapOk, ok, unwrap, type Result } from '../algebra/result.js';
import { compile } from '../kv/resolver.js';
import { field } from '../kv/spec.js';
import { boolean } from '../parser/built-in.js';
import { oneOf } from '../parser/combinators.js';
import { AMBIGUITY_POLICIES } from '../record/types.js';
import { DEFAULT_LOGGING, DEFAULT_LOOKUP, DEFAULT_UPDATE } from './defaults.js';
import type { Settings } from './types.js';

const lookupSection = unwrap(
  compile([
    field('string_key_fallback', boolean(), { default: DEFAULT_LOOKUP.string_key_fallback }),
  ])
);

const updateSection = unwrap(
  compile([
    field('on_ambiguous_match', oneOf(AMBIGUITY_POLICIES), {
      default: DEFAULT_UPDATE.on_ambiguous_match,
    }),
  ])
);

const loggingSection = unwrap(
  compile([field('debug', boolean(), { default: DEFAULT_LOGGING.debug })])
);

const settingsDocument = unwrap(
  compile([
    field('lookup', lookupSection, { default: DEFAULT_LOOKUP }),
    field('update', updateSection, { default: DEFAULT_UPDATE }),
    field('logging', loggingSection, { default: DEFAULT_LOGGING }),
  ])
);

function parseToml(tomlContent: string): Result<unknown> {
  try {
    return ok(TOML.parse(tomlContent));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(domainError('invalid_settings_syntax', { message }));
  }
}

/**
 * Parses a TOML string into settings, filling in defaults for missing
 * sections and keys. Unknown keys are ignored.
 *
 * @param tomlContent - Raw TOML content.
 * @returns The settings, `invalid_settings_syntax` for malformed TOML, or
 *   `failed_to_parse_field` naming the section and key of a bad value.
 *
 * @example
 * ```typescript
 * const settings = parseSettings(`
 * [update]
 * on_ambiguous_match = "error"
 * `);
 * // settings.value.update.on_ambiguous_match === 'error'
 * ```
 */
export function parseSettings(tomlContent: string): Result<Settings> {
  return andThen(parseToml(tomlContent), (document) =>
    mapOk(settingsDocument(document), (parsed) => ({
      lookup: { ...parsed.lookup },
      update: { ...parsed.update },
      logging: { ...parsed.logging },
    }))
  );
}

/**
 * Reads and parses a settings file.
 *
 * File system errors reject the promise; content errors are returned.
 */
export async function loadSettings(path: string): Promise<Result<Settings>> {
  const content = await readFile(path, 'utf8');
  return parseSettings(content);
}
