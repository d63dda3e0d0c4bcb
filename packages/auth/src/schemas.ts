/**
 * OAuth2 client configuration schema with field normalization.
 *
 * Provides the Zod schema validating client configuration from config
 * files, environment or code. Handles field name variations
 * (tokenUrl/tokenEndpoint, authUrl/authorizationEndpoint) transparently.
 *
 * @example
 * ```typescript
 * import { ClientConfigSchema } from './schemas.js';
 *
 * const config = ClientConfigSchema.parse({
 *   clientId: 'my-client',
 *   clientSecret: 'test-secret',
 *   tokenUrl: 'https://auth.example.com/token', // normalized to tokenEndpoint
 * });
 * ```
 *
 * @public
 */

import { z } from 'zod';

const ClientConfigBaseSchema = z.object({
  clientId: z.string().min(1, 'clientId must not be empty'),
  /** Presence (non-empty) switches token requests to HTTP Basic auth */
  clientSecret: z.string().optional(),
  /** Merged into every token request body */
  defaultBody: z.record(z.string()).default({}),
  authorizationEndpoint: z.string().url().optional(),
  tokenEndpoint: z.string().url().optional(),
});

/**
 * Moves an alias field onto its canonical name unless the canonical field
 * is already set.
 * @internal
 */
function normalizeAlias(
  result: Record<string, unknown>,
  alias: string,
  canonical: string,
): void {
  if (result[canonical] === undefined && result[alias] !== undefined) {
    result[canonical] = result[alias];
  }
  delete result[alias];
}

/**
 * Zod schema for the OAuth2 client configuration.
 *
 * Normalizes before validating:
 * - tokenUrl → tokenEndpoint
 * - authUrl → authorizationEndpoint
 *
 * Endpoints are optional; operations that need a missing one fail with a
 * `ConfigurationError` when called.
 *
 * @public
 * @see {@link ClientConfig}
 */
export const ClientConfigSchema = z.preprocess((input: unknown) => {
  if (typeof input !== 'object' || input === null) return input;

  const result: Record<string, unknown> = { ...input };
  normalizeAlias(result, 'tokenUrl', 'tokenEndpoint');
  normalizeAlias(result, 'authUrl', 'authorizationEndpoint');
  return result;
}, ClientConfigBaseSchema);

/**
 * Validated client configuration.
 *
 * @public
 * @see {@link ClientConfigSchema}
 */
export type ClientConfig = z.output<typeof ClientConfigSchema>;

/**
 * Client configuration as accepted by the constructor, before defaults
 * and alias normalization.
 *
 * @public
 */
export type ClientConfigInput = z.input<typeof ClientConfigBaseSchema> & {
  tokenUrl?: string;
  authUrl?: string;
};
