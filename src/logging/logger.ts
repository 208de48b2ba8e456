/**
 * Structured stderr logger.
 *
 * Every component receives its logger through its constructor; there is no
 * process-wide logger. Output goes to stderr so stdout stays free for the
 * interactive client and for patch output.
 */

import { isErrorLike } from '../errors.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFields = Record<string, unknown>;

export type LogSink = (line: string) => void;

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  fields?: LogFields;
  sink?: LogSink;
  /** Clock override for deterministic output in tests */
  now?: () => Date;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly scope: string | undefined;
  private readonly fields: LogFields;
  private readonly sink: LogSink;
  private readonly now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.scope = options.scope;
    this.fields = options.fields ?? {};
    this.sink = options.sink ?? ((line) => console.error(line));
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Derive a logger that prefixes a scope and carries extra fields,
   * e.g. per-connection `client_ip` / `client_id`.
   */
  child(scope: string | undefined, fields: LogFields = {}): Logger {
    return new Logger({
      level: this.level,
      scope: scope ?? this.scope,
      fields: { ...this.fields, ...fields },
      sink: this.sink,
      now: this.now,
    });
  }

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  trace(message: string, fields?: LogFields): void {
    this.log('trace', message, fields);
  }

  debug(message: string, fields?: LogFields): void {
    this.log('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.log('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.log('error', message, fields);
  }

  private log(level: LogLevel, message: string, fields?: LogFields): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const scope = this.scope ? ` [${this.scope}]` : '';
    let line = `[${this.now().toISOString()}] [${level.toUpperCase()}]${scope} ${message}`;

    const merged = { ...this.fields, ...fields };
    if (Object.keys(merged).length > 0) {
      line += ` ${JSON.stringify(merged, errorReplacer)}`;
    }

    this.sink(line);
  }
}

function errorReplacer(_key: string, value: unknown): unknown {
  if (isErrorLike(value)) {
    return value.message;
  }
  return value;
}

/** Logger that drops everything. */
export function silentLogger(): Logger {
  return new Logger({ level: 'silent' });
}
