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
export interface PasswordTokenOptions {
  scope?: ScopeInput | null;
  extra?: ExtraParams;
}

/**
 * Resource Owner Password Credentials Grant (RFC 6749 §4.3).
 *
 * Legacy flow for clients the resource owner already trusts with their
 * credentials.
 * @public
 */
export class ResourceOwnerPasswordCredentialsGrant {
  public readonly kind = 'password';

  public constructor(public readonly client: OAuth2Client) {}

  public async getToken(
    username: string,
    password: string,
    options: PasswordTokenOptions = {},
  ): Promise<TokenResponse> {
    return this.client.requestToken(
      'password',
      undefined,
      withExtra({ username, password, scope: options.scope }, options.extra),
    );
  }
}
