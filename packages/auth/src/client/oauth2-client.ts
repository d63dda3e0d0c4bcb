import { generateRequestId, logError, logEvent } from '@grantline/core';
import {
  ConfigurationError,
  InvalidResponseError,
  ServerError,
} from '../errors/oauth2-client-error.js';
import type { ClientConfig, ClientConfigInput } from '../schemas.js';
import { FetchHttpTransport } from '../transport/fetch-http-transport.js';
import type {
  HttpResponse,
  HttpTransport,
} from '../transport/http-transport.js';
import type {
  ExtraParams,
  GrantTypeName,
  RequestParams,
  ResponseType,
  ScopeInput,
  TokenResponse,
} from '../utils/oauth-types.js';
import {
  compactParams,
  isJsonObject,
  withExtra,
} from '../utils/params/compact-params.js';
import { appendQuery } from '../utils/url/append-query.js';
import type { EnvSource } from '../utils/env/expand-env-refs.js';
import { resolveClientConfig } from '../utils/oauth-utils.js';

/**
 * Options for {@link OAuth2Client}.
 * @public
 */
export interface OAuth2ClientOptions {
  /** HTTP capability for token requests, a {@link FetchHttpTransport} by default */
  transport?: HttpTransport;
  /** Variables `${VAR}` references in the configuration resolve against */
  envSource?: EnvSource;
}

/**
 * Options for {@link OAuth2Client.getTokenByRefreshToken}.
 * @public
 */
export interface RefreshTokenOptions {
  /** Must not exceed the originally granted scope (RFC 6749 §6) */
  scope?: ScopeInput | null;
  extra?: ExtraParams;
}

/**
 * Low-level OAuth 2.0 client (RFC 6749).
 *
 * Holds the client identity and endpoints and provides the two primitives
 * every grant is built on:
 * - {@link buildAuthorizationUrl} for the front-channel redirect
 * - {@link requestToken} for the back-channel token request
 *
 * Instances keep no state besides their frozen configuration and can be
 * shared between concurrent flows. The grant wrappers in `../grants` spell
 * out which parameters each flow needs.
 *
 * Client authentication (RFC 6749 §2.3.1): when both `clientId` and
 * `clientSecret` are non-empty, token requests use HTTP Basic auth.
 * Otherwise credentials travel in the body only, typically through
 * `defaultBody` (`{ client_secret: '...' }`).
 * @example
 * ```typescript
 * const client = new OAuth2Client({
 *   clientId: 'my-client-id',
 *   clientSecret: 'test-secret',
 *   tokenEndpoint: 'https://auth.example.com/oauth/token',
 * });
 *
 * const response = await client.requestToken('client_credentials', undefined, {
 *   scope: ['api:read', 'api:write'],
 * });
 * ```
 * @public
 */
export class OAuth2Client {
  public readonly config: Readonly<ClientConfig>;
  private readonly transport: HttpTransport;

  /**
   * @param config - Client configuration; `${VAR}` references are resolved here
   * @throws {ConfigurationError} When the configuration is invalid
   */
  public constructor(config: ClientConfigInput, options: OAuth2ClientOptions = {}) {
    const resolved = resolveClientConfig(config, options.envSource);
    this.config = Object.freeze({
      ...resolved,
      defaultBody: Object.freeze({ ...resolved.defaultBody }),
    });
    this.transport = options.transport ?? new FetchHttpTransport();
  }

  public get clientId(): string {
    return this.config.clientId;
  }

  /**
   * Builds the URL the resource owner is sent to (RFC 6749 §4.1.1, §4.2.1).
   *
   * `client_id` and `response_type` come first; `params` may override them.
   * Unset values are dropped, collections (scope) joined with spaces.
   * @param responseType - 'code' or 'token'
   * @param params - redirect_uri, scope, state and any extension parameter
   * @returns The authorization endpoint with the request appended
   * @throws {ConfigurationError} When no authorization endpoint is configured
   */
  public buildAuthorizationUrl(
    responseType: ResponseType,
    params: RequestParams = {},
  ): string {
    const endpoint = this.config.authorizationEndpoint;
    if (!endpoint) {
      throw ConfigurationError.missingEndpoint('authorizationEndpoint');
    }

    const query = compactParams({
      client_id: this.config.clientId,
      response_type: responseType,
      ...params,
    });
    const url = appendQuery(endpoint, query);

    logEvent('debug', 'oauth2:authorization_url_built', {
      responseType,
      endpoint,
      parameters: Object.keys(query),
    });

    return url;
  }

  /**
   * Sends a token request (RFC 6749 §3.2) and returns the decoded body.
   *
   * Body parameters, later wins:
   * 1. `grant_type`, `client_id`
   * 2. `defaultBody`
   * 3. `bodyParams`, except unset values, which keep the earlier value
   *
   * A 4xx answer is not an error here: its JSON body (`{ error, ... }`) is
   * returned like a success body, and {@link isTokenErrorResponse} tells
   * them apart.
   * @param grantType - The `grant_type` parameter
   * @param query - Optional parameters for the endpoint's query string
   * @param bodyParams - Grant-specific body parameters
   * @returns The decoded JSON object, unchanged
   * @throws {ConfigurationError} When no token endpoint is configured
   * @throws {ServerError} When the endpoint answers with status 500 or above
   * @throws {InvalidResponseError} When the body is not a JSON object
   *   (arrays and scalars included)
   * @throws Whatever the transport rejects with, unchanged
   */
  public async requestToken(
    grantType: GrantTypeName,
    query?: RequestParams,
    bodyParams: RequestParams = {},
  ): Promise<TokenResponse> {
    const endpoint = this.config.tokenEndpoint;
    if (!endpoint) {
      throw ConfigurationError.missingEndpoint('tokenEndpoint');
    }

    const body = new URLSearchParams({
      grant_type: grantType,
      client_id: this.config.clientId,
      ...this.config.defaultBody,
      // Unset values mean "use the default", so they are dropped before merging
      ...compactParams(bodyParams),
    });

    const headers: Record<string, string> = {
      Accept: 'application/json',
      'Content-Type': 'application/x-www-form-urlencoded',
    };
    const basicAuth = this.basicAuthorization();
    if (basicAuth) {
      headers.Authorization = basicAuth;
    }

    const url = appendQuery(endpoint, compactParams(query ?? {}));
    const requestId = generateRequestId('token');

    logEvent('debug', 'oauth2:token_request_start', {
      requestId,
      tokenEndpoint: endpoint,
      grantType,
      clientAuthentication: basicAuth ? 'basic' : 'body',
      parameters: [...body.keys()],
    });

    let response: HttpResponse;
    try {
      response = await this.transport.send({
        method: 'POST',
        url,
        headers,
        body: body.toString(),
      });
    } catch (error) {
      logError('token_request', error, { requestId, tokenEndpoint: endpoint });
      throw error;
    }

    if (response.status >= 500) {
      logEvent('warn', 'oauth2:server_error', {
        requestId,
        status: response.status,
      });
      throw new ServerError(response.status, response.statusText);
    }

    const decoded = await this.decodeBody(response, requestId);

    logEvent('debug', 'oauth2:token_response', {
      requestId,
      status: response.status,
      error: typeof decoded.error === 'string' ? decoded.error : undefined,
    });

    return decoded;
  }

  /**
   * Uses a refresh token to obtain a new access token (RFC 6749 §6).
   * @param refreshToken - The refresh token issued earlier
   * @returns The decoded token response
   */
  public async getTokenByRefreshToken(
    refreshToken: string,
    options: RefreshTokenOptions = {},
  ): Promise<TokenResponse> {
    return this.requestToken(
      'refresh_token',
      undefined,
      withExtra(
        { refresh_token: refreshToken, scope: options.scope },
        options.extra,
      ),
    );
  }

  /**
   * `Basic` header value when both client id and secret are non-empty.
   * @internal
   */
  private basicAuthorization(): string | undefined {
    const { clientId, clientSecret } = this.config;
    if (!clientId || !clientSecret) {
      return undefined;
    }
    const credentials = Buffer.from(`${clientId}:${clientSecret}`).toString(
      'base64',
    );
    return `Basic ${credentials}`;
  }

  /**
   * Awaits the JSON body and checks it is an object.
   * @internal
   */
  private async decodeBody(
    response: HttpResponse,
    requestId: string,
  ): Promise<TokenResponse> {
    let decoded: unknown;
    try {
      decoded = await response.json();
    } catch (error) {
      logEvent('warn', 'oauth2:invalid_response', { requestId });
      throw new InvalidResponseError(
        'Failed to parse OAuth2 token response: invalid JSON',
        error instanceof Error ? error : undefined,
      );
    }

    if (!isJsonObject(decoded)) {
      logEvent('warn', 'oauth2:invalid_response', { requestId });
      throw new InvalidResponseError(
        'OAuth2 token response is not a JSON object',
      );
    }
    return decoded;
  }
}
