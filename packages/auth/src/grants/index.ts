import type { OAuth2Client } from '../client/oauth2-client.js';
import { AuthorizationCodeGrant } from './authorization-code-grant.js';
import { ClientCredentialsGrant } from './client-credentials-grant.js';
import { ImplicitGrant } from './implicit-grant.js';
import { ResourceOwnerPasswordCredentialsGrant } from './resource-owner-password-credentials-grant.js';

export * from './authorization-code-grant.js';
export * from './client-credentials-grant.js';
export * from './implicit-grant.js';
export * from './resource-owner-password-credentials-grant.js';

/**
 * The grant variants, keyed by their `kind`.
 * @public
 */
export interface GrantsByKind {
  authorization_code: AuthorizationCodeGrant;
  implicit: ImplicitGrant;
  password: ResourceOwnerPasswordCredentialsGrant;
  client_credentials: ClientCredentialsGrant;
}

export type GrantKind = keyof GrantsByKind;

/**
 * Any grant variant; narrow on `kind`.
 * @public
 */
export type Grant = GrantsByKind[GrantKind];

const GRANT_FACTORIES: {
  [K in GrantKind]: (client: OAuth2Client) => GrantsByKind[K];
} = {
  authorization_code: (client) => new AuthorizationCodeGrant(client),
  implicit: (client) => new ImplicitGrant(client),
  password: (client) => new ResourceOwnerPasswordCredentialsGrant(client),
  client_credentials: (client) => new ClientCredentialsGrant(client),
};

/**
 * Creates the grant of the given kind over a client.
 * @example
 * ```typescript
 * const grant = createGrant('client_credentials', client);
 * await grant.getToken({ scope: 'read' });
 * ```
 * @public
 */
export function createGrant<K extends GrantKind>(
  kind: K,
  client: OAuth2Client,
): GrantsByKind[K] {
  const factory: (client: OAuth2Client) => GrantsByKind[K] =
    GRANT_FACTORIES[kind];
  return factory(client);
}
