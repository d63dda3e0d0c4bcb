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
export interface ClientCredentialsTokenOptions {
  scope?: ScopeInput | null;
  /** e.g. `audience`, or `client_secret` when not configured on the client */
  extra?: ExtraParams;
}

/**
 * Client Credentials Grant (RFC 6749 §4.4), a.k.a. the backend application
 * flow.
 *
 * The client authenticates with its own credentials: HTTP Basic when the
 * client has a secret, otherwise whatever `defaultBody` or `extra` carries.
 * @example
 * ```typescript
 * const grant = new ClientCredentialsGrant(client);
 * const response = await grant.getToken({ scope: 'read write' });
 * if (isTokenErrorResponse(response)) {
 *   // e.g. { error: 'invalid_scope' }
 * }
 * ```
 * @public
 */
export class ClientCredentialsGrant {
  public readonly kind = 'client_credentials';

  public constructor(public readonly client: OAuth2Client) {}

  public async getToken(
    options: ClientCredentialsTokenOptions = {},
  ): Promise<TokenResponse> {
    return this.client.requestToken(
      'client_credentials',
      undefined,
      withExtra({ scope: options.scope }, options.extra),
    );
  }
}
