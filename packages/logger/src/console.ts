import { type CreateLoggerOptions, type LogFn, type Logger, LogLevel } from './types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.Trace]: 10,
  [LogLevel.Debug]: 20,
  [LogLevel.Info]: 30,
  [LogLevel.Warn]: 40,
  [LogLevel.Error]: 50,
  [LogLevel.Fatal]: 60,
  [LogLevel.Silent]: Number.POSITIVE_INFINITY,
};

type ConsoleMethod = (...args: unknown[]) => void;

/**
 * Console-based logger that merges context data into every call and drops
 * calls below its level.
 *
 * @example
 * ```typescript
 * const logger = new ConsoleLogger({ command: 'install' });
 * logger.child({ step: 'download' }).info('Fetching compose file');
 * // { command: 'install', step: 'download', ts: 1234567890 } Fetching compose file
 * ```
 */
export class ConsoleLogger implements Logger {
  /**
   * @param data - Context included in every log call
   * @param level - Calls below this level are dropped
   */
  constructor(
    readonly data: Record<string, unknown> = {},
    readonly level: LogLevel = LogLevel.Info,
  ) {}

  private createLogFn(level: LogLevel, logMethod: ConsoleMethod): LogFn {
    return <T extends object>(
      objOrMsg: T | string,
      msg?: string,
      ...args: unknown[]
    ): void => {
      if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
        return;
      }

      const ts = Date.now();

      if (typeof objOrMsg === 'string') {
        logMethod({ ...this.data, ts }, objOrMsg, ...args);
        return;
      }

      const mergedData = { ...this.data, ...objOrMsg, ts };
      if (msg) {
        logMethod(mergedData, msg, ...args);
      } else {
        logMethod(mergedData, ...args);
      }
    };
  }

  debug: LogFn = this.createLogFn(LogLevel.Debug, console.debug.bind(console));
  info: LogFn = this.createLogFn(LogLevel.Info, console.info.bind(console));
  warn: LogFn = this.createLogFn(LogLevel.Warn, console.warn.bind(console));
  error: LogFn = this.createLogFn(LogLevel.Error, console.error.bind(console));
  /** Uses console.error */
  fatal: LogFn = this.createLogFn(LogLevel.Fatal, console.error.bind(console));
  trace: LogFn = this.createLogFn(LogLevel.Trace, console.trace.bind(console));

  /**
   * Creates a child logger that inherits this logger's context and level.
   */
  child(obj: Record<string, unknown>): Logger {
    return new ConsoleLogger({ ...this.data, ...obj }, this.level);
  }
}

export const DEFAULT_LOGGER: Logger = new ConsoleLogger();

/** Logger that drops every call. */
export const SILENT_LOGGER: Logger = new ConsoleLogger({}, LogLevel.Silent);

/**
 * Creates a console logger with the same options shape as the pino factory.
 * Only `level` applies here.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return new ConsoleLogger({}, options.level ?? LogLevel.Info);
}
