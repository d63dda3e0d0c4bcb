import { OAuth2ClientError } from '../../errors/oauth2-client-error.js';

const RETRYABLE_NETWORK_CODES = [
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ENETUNREACH',
  'ECONNABORTED',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
];

/**
 * Reads the system error code of an error or of its `cause`.
 * undici (Node's fetch) reports `TypeError: fetch failed` with the socket
 * error as cause.
 * @internal
 */
function networkCode(error: Error): string | undefined {
  for (const candidate of [error, error.cause]) {
    if (
      candidate instanceof Error &&
      'code' in candidate &&
      typeof candidate.code === 'string'
    ) {
      return candidate.code;
    }
  }
  return undefined;
}

/**
 * Determines whether a failed token request may be retried by the caller.
 *
 * The client never retries on its own. Retryable are:
 * - {@link ServerError} (5xx from the token endpoint)
 * - transient network failures surfaced by the transport
 *
 * Other client errors (configuration, state mismatch, malformed body) are
 * not.
 * @param error - The error thrown by a token request
 * @public
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof OAuth2ClientError) {
    return error.isRetryable;
  }
  if (!(error instanceof Error)) {
    return false;
  }

  const code = networkCode(error);
  if (code && RETRYABLE_NETWORK_CODES.includes(code)) {
    return true;
  }

  if (error.name === 'TimeoutError') {
    return true;
  }

  const errorMessage = error.message.toLowerCase();
  return RETRYABLE_NETWORK_CODES.some((c) =>
    errorMessage.includes(c.toLowerCase()),
  );
}
