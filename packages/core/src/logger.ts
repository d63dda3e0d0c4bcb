import { rootLogger } from './logging/pino-setup.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Writes a structured log event through the root logger.
 *
 * Records have the shape `{ event, data }` so the redaction paths in
 * pino-setup apply to the payload.
 * @param level - Log severity level
 * @param event - Event identifier, `area:what_happened`
 * @param data - Optional structured data to include
 * @public
 */
export function logEvent(
  level: LogLevel,
  event: string,
  data?: Record<string, unknown>,
): void {
  rootLogger[level]({ event, data }, event);
}

/**
 * Logs an error event with the error's message, stack and system error code.
 *
 * The code goes out as `errorCode`: `code` is redacted as an authorization
 * code.
 * @param context - Label identifying where the error occurred
 * @param rawError - The thrown value
 * @param extra - Additional structured context
 * @public
 */
export function logError(
  context: string,
  rawError: unknown,
  extra?: Record<string, unknown>,
): void {
  const err = rawError instanceof Error ? rawError : undefined;
  const errorCode =
    err && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
  logEvent('error', `error:${context}`, {
    message: err?.message ?? String(rawError),
    stack: err?.stack,
    errorCode,
    extra,
  });
}
