/**
 * Result, Option and DomainError algebra shared by every parser.
 *
 * @packageDocumentation
 */

export {
  type Result,
  ok,
  err,
  isOk,
  isErr,
  mapOk,
  mapErr,
  andThen,
  fold,
  unwrap,
} from './result.js';
export {
  type Option,
  present,
  absent,
  isPresent,
  isAbsent,
  isOption,
  mapOption,
  getOrElse,
} from './option.js';
export {
  type DomainError,
  type ErrorDetails,
  type ErrorKind,
  domainError,
  reason,
  details,
  causedBy,
  mapDetails,
  wrap,
  causalChain,
  rootCause,
  formatError,
  ParseFailure,
} from './error.js';
