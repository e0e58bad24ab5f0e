/**
 * Structured logging for resolver and updater compilation.
 *
 * Entries are written as single JSON lines on stderr. Parsing itself never
 * logs; only compilation steps emit debug-level entries, so a logger created
 * without `debugMode` stays silent.
 *
 * @packageDocumentation
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * One line of output, e.g.
 * `{"timestamp":"...","level":"debug","component":"fieldwise","event":"resolver_compiled","data":{"fields":["name"]}}`.
 */
export interface LogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly component: string;
  /** Snake-case event name such as `update_parameter_ambiguous`. */
  readonly event: string;
  readonly data?: Record<string, unknown>;
}

export interface LoggerOptions {
  readonly component: string;
  /** Writes `debug` entries when set. Off by default. */
  readonly debugMode?: boolean;
}

/**
 * JSON-lines logger on stderr.
 *
 * `data` that `JSON.stringify` rejects (cycles, BigInt) is replaced by a
 * `serializationError` field.
 *
 * @example
 * ```typescript
 * const log = new Logger({ component: 'signup-form', debugMode: true });
 * unwrap(compile(signupFields, { logger: log }));
 * // {"level":"debug","event":"resolver_compiled",...}
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;

  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
  }

  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const base: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
    };
    const entry: LogEntry = data === undefined ? base : { ...base, data };

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
      line = JSON.stringify({
        ...base,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      });
    }

    process.stderr.write(line + '\n');
  }
}

/** Silent default used when no `logger` option is given. */
export const logger = new Logger({ component: 'fieldwise', debugMode: false });
