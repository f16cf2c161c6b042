/**
 * Default sensitive field paths for redaction.
 *
 * Used when `redact: true` is set, and merged with custom paths unless
 * `resolution: 'override'` is specified.
 */
export const DEFAULT_REDACT_PATHS: string[] = [
  // Authentication & authorization
  'password',
  'pass',
  'passwd',
  'secret',
  'token',
  'accessToken',
  'refreshToken',
  'apiKey',
  'api_key',
  'authorization',
  'credential',
  'credentials',

  '*.password',
  '*.secret',
  '*.token',
  '*.apiKey',
  '*.authorization',

  // HTTP headers
  'headers.authorization',
  'headers.Authorization',
  'headers["x-api-key"]',
  'headers.cookie',

  // Connection strings embed credentials
  'connectionString',
  'databaseUrl',
  'brokerUrl',
  '*.brokerUrl',
];
