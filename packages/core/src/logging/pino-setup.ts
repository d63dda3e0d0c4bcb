/**
 * Pino logger setup with automatic redaction of sensitive data
 *
 * Uses fast-redact (through pino's `redact` option) for path-based redaction
 * of client credentials, tokens and redirect parameters.
 */

import { pino, stdSerializers, type DestinationStream, type Logger } from 'pino';

/**
 * Levels accepted by `GRANTLINE_LOG_LEVEL`.
 * @public
 */
export const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const;

export type PinoLevel = (typeof LOG_LEVELS)[number];

/**
 * Paths censored in every log record.
 *
 * Covers top-level fields and one level of nesting, which is where
 * `logEvent` puts its payload (`{ event, data: { ... } }`).
 * @public
 */
export const REDACT_PATHS: readonly string[] = [
  // Client authentication
  'client_secret',
  '*.client_secret',
  'clientSecret',
  '*.clientSecret',
  'password',
  '*.password',
  'authorization',
  '*.authorization',
  '*.Authorization',

  // Tokens
  'access_token',
  '*.access_token',
  'refresh_token',
  '*.refresh_token',
  'id_token',
  '*.id_token',
  'token',
  '*.token',

  // Authorization redirect
  'code',
  '*.code',
  'state',
  '*.state',
  'code_verifier',
  '*.code_verifier',
];

/**
 * Reads the log level from the environment, falling back to 'silent'.
 * @internal
 */
function levelFromEnv(env: Record<string, string | undefined>): PinoLevel {
  const requested = (env.GRANTLINE_LOG_LEVEL ?? '').toLowerCase();
  const match = LOG_LEVELS.find((level) => level === requested);
  return match ?? 'silent';
}

/**
 * Creates a logger with the library's redaction rules.
 *
 * @param level - Minimum level to emit
 * @param destination - Optional stream, stdout when omitted
 * @example
 * ```typescript
 * const lines: string[] = [];
 * const logger = createLogger('info', { write: (line) => lines.push(line) });
 * logger.info({ client_secret: 'test-secret' }); // client_secret: '[REDACTED]'
 * ```
 * @public
 */
export function createLogger(
  level: PinoLevel,
  destination?: DestinationStream,
): Logger {
  const options = {
    level,
    redact: {
      paths: [...REDACT_PATHS],
      censor: '[REDACTED]',
      remove: false, // Keep the keys, just redact values
    },
    serializers: {
      err: stdSerializers.err,
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

/**
 * Root logger instance shared by every package.
 *
 * Silent unless `GRANTLINE_LOG_LEVEL` says otherwise. The level can also be
 * changed at run time:
 *
 * @example
 * ```typescript
 * import { rootLogger } from './pino-setup.js';
 *
 * rootLogger.level = 'debug';
 * ```
 * @public
 */
const rootLogger: Logger = createLogger(levelFromEnv(process.env));

export { rootLogger, levelFromEnv };
