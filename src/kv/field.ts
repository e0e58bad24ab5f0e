/**
 * Validated field specifications.
 *
 * A {@link Field} can only be obtained through {@link Field.fromSpec}, which
 * rejects malformed specs and illegal option combinations. Resolvers work on
 * Fields exclusively.
 *
 * @packageDocumentation
 */

import { isDeepStrictEqual } from 'node:util';
import { domainError, type DomainError } from '../algebra/error.js';
import { absent, present, type Option } from '../algebra/option.js';
import { err, ok, type Result } from '../algebra/result.js';
import { nil } from '../parser/built-in.js';
import { predicate, union } from '../parser/combinators.js';
import { isPropertyName, isRecordObject, type RecordObject } from '../parser/shape.js';
import type { Parser } from '../parser/types.js';
import type { FieldKey } from './types.js';

const FLAG_OPTIONS = ['optional', 'nullable', 'recurse'] as const;

function isParser(value: unknown): value is Parser<unknown> {
  return typeof value === 'function';
}

function isOptionalFlag(value: unknown): value is boolean | undefined {
  return value === undefined || typeof value === 'boolean';
}

function isOptionalKey(value: unknown): value is FieldKey | undefined {
  return value === undefined || isPropertyName(value);
}

function invalidSpec(spec: unknown): Result<never> {
  return err(domainError('invalid_field_spec', { spec }));
}

/**
 * A field specification that has passed validation.
 */
export class Field {
  private constructor(
    /** Output key. */
    public readonly name: FieldKey,
    /** Input key the value is read from. */
    public readonly from: FieldKey,
    /** Effective parser, already widened to accept `null` when nullable. */
    public readonly parser: Parser<unknown>,
    public readonly optional: boolean,
    /** Value used when the key is missing. */
    public readonly fallback: Option<unknown>,
    public readonly nullable: boolean,
    public readonly recurse: boolean
  ) {
    Object.freeze(this);
  }

  /**
   * Validates a field specification.
   *
   * @param spec - Candidate spec, of any shape.
   * @returns The Field, or `invalid_field_spec` with the offending spec in its details.
   */
  static fromSpec(spec: unknown): Result<Field, DomainError> {
    if (!isRecordObject(spec)) {
      return invalidSpec(spec);
    }
    const { name, parser, from } = spec;
    if (!isPropertyName(name) || !isParser(parser) || !isOptionalKey(from)) {
      return invalidSpec(spec);
    }
    if (!FLAG_OPTIONS.every((option) => isOptionalFlag(spec[option]))) {
      return invalidSpec(spec);
    }

    const optional = spec.optional === true;
    const nullable = spec.nullable === true;
    const recurse = spec.recurse === true;
    const fallback = readDefault(spec);

    const exclusive = [optional, fallback.present, nullable].filter(Boolean).length;
    if (exclusive > 1) {
      return invalidSpec(spec);
    }

    const effective = nullable ? union([parser, nil()]) : parser;
    return ok(new Field(name, from ?? name, effective, optional, fallback, nullable, recurse));
  }

  /**
   * Derives the field used to validate a single update parameter.
   *
   * Optional and recursive semantics are dropped, so only a present key
   * matches. A default value becomes an accepted value in its own right.
   */
  forUpdate(): Field {
    const fallback = this.fallback;
    const parser = fallback.present
      ? union([this.parser, predicate((value) => isDeepStrictEqual(value, fallback.value))])
      : this.parser;
    return new Field(this.name, this.from, parser, false, absent(), this.nullable, false);
  }
}

function readDefault(spec: RecordObject): Option<unknown> {
  return Object.prototype.hasOwnProperty.call(spec, 'default') ? present(spec.default) : absent();
}
