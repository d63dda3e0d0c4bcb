/**
 * Logging infrastructure exports
 *
 * Provides structured logging with automatic redaction via pino + fast-redact
 */

export {
  rootLogger,
  createLogger,
  levelFromEnv,
  LOG_LEVELS,
  REDACT_PATHS,
} from './pino-setup.js';
export type { PinoLevel } from './pino-setup.js';

export { logEvent, logError } from '../logger.js';
export type { LogLevel } from '../logger.js';
