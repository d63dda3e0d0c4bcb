import type { OAuth2Client } from '../client/oauth2-client.js';
import type {
  ExtraParams,
  ScopeInput,
  TokenResponse,
} from '../utils/oauth-types.js';
import { withExtra } from '../utils/params/compact-params.js';

/**
 * @public
 */
export interface AuthorizationCodeUrlOptions {
  /** Echoed verbatim. The server falls back to the registered one when unset. */
  redirectUri?: string | null;
  /** Normalized to a space-delimited string before sending */
  scope?: ScopeInput | null;
  /** Opaque anti-CSRF value; keep it to check the redirect with `validateAuthorization` */
  state?: string | null;
  extra?: ExtraParams;
}

/**
 * @public
 */
export interface AuthorizationCodeTokenOptions {
  /**
   * Required if the authorization request carried a `redirect_uri`, and then
   * identical to it (RFC 6749 §4.1.3). Not checked here.
   */
  redirectUri?: string | null;
  /** e.g. `client_id` for a public client that does not authenticate, or PKCE's `code_verifier` */
  extra?: ExtraParams;
}

/**
 * Authorization Code Grant (RFC 6749 §4.1).
 *
 * Usable by confidential and public clients.
 * @example
 * ```typescript
 * const grant = new AuthorizationCodeGrant(client);
 * const url = grant.authorizationUrl({
 *   redirectUri: 'https://app.example.com/callback',
 *   scope: ['openid', 'profile'],
 *   state,
 * });
 * // ... user returns to the redirect URI
 * const { code } = validateAuthorization(callbackQuery, state);
 * const token = await grant.getToken(code[0], {
 *   redirectUri: 'https://app.example.com/callback',
 * });
 * ```
 * @public
 */
export class AuthorizationCodeGrant {
  public readonly kind = 'authorization_code';

  public constructor(public readonly client: OAuth2Client) {}

  /**
   * Generates the authorization URL the resource owner visits.
   */
  public authorizationUrl(options: AuthorizationCodeUrlOptions = {}): string {
    return this.client.buildAuthorizationUrl(
      'code',
      withExtra(
        {
          redirect_uri: options.redirectUri,
          scope: options.scope,
          state: options.state,
        },
        options.extra,
      ),
    );
  }

  /**
   * Exchanges the authorization code for a token (RFC 6749 §4.1.3).
   * @param code - The code received on the redirect
   */
  public async getToken(
    code: string,
    options: AuthorizationCodeTokenOptions = {},
  ): Promise<TokenResponse> {
    return this.client.requestToken(
      'authorization_code',
      undefined,
      withExtra({ code, redirect_uri: options.redirectUri }, options.extra),
    );
  }
}
