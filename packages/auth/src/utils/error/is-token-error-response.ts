import type { OAuth2ErrorResponse, TokenResponse } from '../oauth-types.js';

/**
 * Tells an RFC 6749 §5.2 error body from a successful token response.
 *
 * The client returns both unchanged; this is the check callers make on the
 * result.
 * @example
 * ```typescript
 * const response = await grant.getToken({ scope: 'read' });
 * if (isTokenErrorResponse(response)) {
 *   console.warn(response.error, response.error_description);
 * }
 * ```
 * @public
 */
export function isTokenErrorResponse(
  response: TokenResponse,
): response is TokenResponse & OAuth2ErrorResponse {
  return typeof response.error === 'string';
}
