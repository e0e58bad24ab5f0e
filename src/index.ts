/**
 * fieldwise
 *
 * Composable parsers for untyped key/value data, compiled into resolvers that
 * build typed records and validate partial updates.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './algebra/index.js';
export * from './parser/index.js';
export * from './kv/index.js';
export * from './record/index.js';
export * from './config/index.js';
export { Logger, logger, type LogEntry, type LogLevel, type LoggerOptions } from './utils/logger.js';
