export {
  ConsoleLogger,
  DEFAULT_LOGGER,
  SILENT_LOGGER,
} from './console';
export { createLogger, DEFAULT_REDACT_PATHS, resolveRedactConfig } from './pino';
export {
  type CreateLoggerOptions,
  type LogFn,
  type Logger,
  LogLevel,
  type RedactOptions,
} from './types';
