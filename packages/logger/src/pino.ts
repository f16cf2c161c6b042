/**
 * Pino logger with built-in redaction support for sensitive data.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@berth/logger/pino';
 *
 * const logger = createLogger({ redact: ['values.secretKey'] });
 * logger.info({ values: { secretKey: 'abc' } }, 'Rendered');
 * // { values: { secretKey: '[Redacted]' } } Rendered
 * ```
 *
 * @module
 */
import { type DestinationStream, type LoggerOptions, pino } from 'pino';
import { DEFAULT_REDACT_PATHS } from './redact-paths';
import type { CreateLoggerOptions, Logger, RedactOptions } from './types';

export { DEFAULT_REDACT_PATHS };

type PinoRedactConfig =
  | string[]
  | {
      paths: string[];
      censor?: string | ((value: unknown, path: string[]) => unknown);
      remove?: boolean;
    };

/**
 * Resolves redaction configuration to what pino accepts.
 * Returns undefined when redaction is disabled.
 */
export function resolveRedactConfig(
  redact: boolean | RedactOptions | undefined,
): PinoRedactConfig | undefined {
  if (redact === undefined || redact === false) {
    return undefined;
  }

  if (redact === true) {
    return DEFAULT_REDACT_PATHS;
  }

  if (Array.isArray(redact)) {
    return [...DEFAULT_REDACT_PATHS, ...redact];
  }

  const { resolution = 'merge', paths, censor, remove } = redact;

  const resolvedPaths =
    resolution === 'override' ? paths : [...DEFAULT_REDACT_PATHS, ...paths];

  const config: PinoRedactConfig = { paths: resolvedPaths };
  if (censor !== undefined) config.censor = censor;
  if (remove !== undefined) config.remove = remove;

  return config;
}

/**
 * Creates a pino logger instance with optional redaction support.
 *
 * Pretty output goes through the pino-pretty transport and is skipped when
 * NODE_ENV is production.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const pretty = options.pretty === true && process.env.NODE_ENV !== 'production';

  const redact = resolveRedactConfig(options.redact);

  const pinoOptions: LoggerOptions = {
    ...(options.level && { level: options.level }),
    ...(redact && { redact }),
    formatters: {
      // Also applied to child bindings, which carry no pid.
      bindings(bindings) {
        const { pid, hostname, ...rest } = bindings;
        return pid === undefined ? rest : { ...rest, nodeVersion: process.version };
      },
      level: (label) => {
        return { level: label.toUpperCase() };
      },
    },
  };

  if (pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname,nodeVersion',
          translateTime: 'SYS:HH:MM:ss',
        },
      },
    });
  }

  if (options.destination) {
    const destination: DestinationStream = {
      write: (msg: string) => {
        options.destination?.write(msg);
      },
    };
    return pino(pinoOptions, destination);
  }

  return pino(pinoOptions);
}
