import type { OAuth2Client } from '../client/oauth2-client.js';
import type { ScopeInput } from '../utils/oauth-types.js';

/**
 * @public
 */
export interface ImplicitUrlOptions {
  redirectUri?: string | null;
  scope?: ScopeInput | null;
  state?: string | null;
}

/**
 * Implicit Grant (RFC 6749 §4.2).
 *
 * Issues access tokens (never refresh tokens) to public clients running in
 * a browser. The token arrives in the fragment of the redirect URI, so
 * there is no token request here; read the fragment with
 * `validateAuthorization`.
 * @public
 */
export class ImplicitGrant {
  public readonly kind = 'implicit';

  public constructor(public readonly client: OAuth2Client) {}

  public authorizationUrl(options: ImplicitUrlOptions = {}): string {
    return this.client.buildAuthorizationUrl('token', {
      redirect_uri: options.redirectUri,
      scope: options.scope,
      state: options.state,
    });
  }
}
