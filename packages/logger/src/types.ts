/**
 * Logging function type that supports both structured and simple logging.
 * Can be called with an object for structured logging or just a message string.
 *
 * @example
 * ```typescript
 * logger.info({ service: 'postgres-db', attempt: 3 }, 'Waiting for service');
 * logger.info('Containers started');
 * ```
 */
export type LogFn = {
  /** Structured logging with context object, optional message, and additional arguments */
  <T extends object>(obj: T, msg?: string, ...args: unknown[]): void;
  /** Simple string logging */
  (msg: string): void;
};

/**
 * Standard logger interface with multiple log levels and child logger support.
 */
export interface Logger {
  /** Verbose information, shown with --debug */
  debug: LogFn;
  /** Progress of a deployment step */
  info: LogFn;
  /** A non-critical step failed and the operation continues */
  warn: LogFn;
  /** A step failed */
  error: LogFn;
  /** The operation is about to abort */
  fatal: LogFn;
  /** Most detailed information */
  trace: LogFn;
  /**
   * Creates a child logger with additional context.
   * Child loggers inherit parent context and add their own.
   */
  child(obj: Record<string, unknown>): Logger;
}

export enum LogLevel {
  Trace = 'trace',
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
  Fatal = 'fatal',
  Silent = 'silent',
}

/**
 * Redaction configuration.
 *
 * - `string[]` paths are merged with the defaults.
 * - The object form can override the defaults with `resolution: 'override'`.
 */
export type RedactOptions =
  | string[]
  | {
      paths: string[];
      censor?: string | ((value: unknown, path: string[]) => unknown);
      remove?: boolean;
      resolution?: 'merge' | 'override';
    };

export type CreateLoggerOptions = {
  pretty?: boolean;
  level?: LogLevel;
  /** `true` enables the default paths */
  redact?: boolean | RedactOptions;
  /** Write to this stream instead of stdout. Ignored when `pretty` is set. */
  destination?: NodeJS.WritableStream;
};
