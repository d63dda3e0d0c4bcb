/**
 * OAuth2 client types following RFC 6749.
 *
 * @public
 */

/**
 * A scope as accepted by the client: a space-delimited string, or an
 * ordered collection of individual scopes joined with single spaces.
 * @public
 */
export type ScopeInput = string | readonly string[] | ReadonlySet<string>;

/**
 * A request parameter value. `undefined` and `null` mean "not set": the
 * parameter is left out of the request.
 * @public
 */
export type ParamValue = ScopeInput | null | undefined;

/**
 * Parameters for an authorization or token request.
 * @public
 */
export type RequestParams = Readonly<Record<string, ParamValue>>;

/**
 * Provider-specific parameters passed through as-is.
 * @public
 */
export type ExtraParams = Readonly<Record<string, string | null | undefined>>;

/**
 * `response_type` values of the authorization endpoint (RFC 6749 §3.1.1).
 * @public
 */
export type ResponseType = 'code' | 'token';

/**
 * `grant_type` values of the token endpoint. Extension grants are plain
 * absolute URIs, hence the open string.
 * @public
 */
export type GrantTypeName =
  | 'authorization_code'
  | 'password'
  | 'client_credentials'
  | 'refresh_token'
  | (string & {});

/**
 * Decoded token endpoint response.
 *
 * Success (RFC 6749 §5.1) and error (§5.2) bodies share this shape and are
 * returned exactly as the server sent them.
 * @public
 * @see {@link isTokenErrorResponse}
 */
export type TokenResponse = Readonly<Record<string, unknown>>;

/**
 * OAuth2 error response following RFC 6749 section 5.2.
 * @public
 */
export interface OAuth2ErrorResponse {
  /** Error code from RFC 6749 (e.g., 'invalid_request', 'invalid_client') */
  error: string;
  /** Human-readable error description */
  error_description?: string;
  /** URI to documentation about the error */
  error_uri?: string;
  [key: string]: unknown;
}

/**
 * Parameters received on the redirect URI.
 * @public
 */
export type RedirectParams = Readonly<
  Record<string, string | readonly string[] | undefined>
>;
