import type { ZodError } from 'zod';
import { ConfigurationError } from '../errors/oauth2-client-error.js';
import {
  ClientConfigSchema,
  type ClientConfig,
  type ClientConfigInput,
} from '../schemas.js';
import { expandEnvRefs, type EnvSource } from './env/expand-env-refs.js';

/**
 * Formats zod issues as `path: message` pairs.
 * @internal
 */
function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validates a client configuration and resolves environment variable
 * references in it.
 *
 * Every string field, `defaultBody` values included, may contain `${VAR}`
 * or `${VAR:default}` patterns. Resolution happens before validation, so an
 * endpoint read from the environment is checked like a literal one.
 * @param config - Configuration as given by the caller
 * @param envSource - Variables to resolve against, `process.env` by default
 * @returns Validated configuration with all references resolved
 * @throws {ConfigurationError} When a variable is missing or validation fails
 * @example
 * ```typescript
 * const config = resolveClientConfig({
 *   clientId: '${OAUTH2_CLIENT_ID}',
 *   clientSecret: '${OAUTH2_CLIENT_SECRET}',
 *   tokenEndpoint: 'https://auth.example.com/oauth/token',
 * });
 * ```
 * @public
 */
export function resolveClientConfig(
  config: ClientConfigInput,
  envSource?: EnvSource,
): ClientConfig {
  const resolved: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(config)) {
    if (typeof value === 'string') {
      resolved[key] = expandEnvRefs(value, envSource);
    } else if (key === 'defaultBody' && typeof value === 'object' && value !== null) {
      const body: Record<string, unknown> = {};
      for (const [name, entry] of Object.entries(value)) {
        body[name] = typeof entry === 'string' ? expandEnvRefs(entry, envSource) : entry;
      }
      resolved[key] = body;
    } else {
      resolved[key] = value;
    }
  }

  const parsed = ClientConfigSchema.safeParse(resolved);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid OAuth2 client configuration: ${describeIssues(parsed.error)}`,
      parsed.error,
    );
  }
  return parsed.data;
}

/**
 * Reads a client configuration from environment variables.
 *
 * | Variable                           | Field                   |
 * | ---------------------------------- | ----------------------- |
 * | `<PREFIX>_CLIENT_ID`               | `clientId`              |
 * | `<PREFIX>_CLIENT_SECRET`           | `clientSecret`          |
 * | `<PREFIX>_AUTHORIZATION_ENDPOINT`  | `authorizationEndpoint` |
 * | `<PREFIX>_TOKEN_ENDPOINT`          | `tokenEndpoint`         |
 *
 * Unset variables leave the field unset.
 * @param env - Variables to read, `process.env` by default
 * @param prefix - Variable name prefix, `OAUTH2` by default
 * @throws {ConfigurationError} When the result is not a valid configuration
 * @public
 */
export function clientConfigFromEnv(
  env: EnvSource = process.env,
  prefix: string = 'OAUTH2',
): ClientConfig {
  return resolveClientConfig(
    {
      clientId: env[`${prefix}_CLIENT_ID`] ?? '',
      clientSecret: env[`${prefix}_CLIENT_SECRET`],
      authorizationEndpoint: env[`${prefix}_AUTHORIZATION_ENDPOINT`],
      tokenEndpoint: env[`${prefix}_TOKEN_ENDPOINT`],
    },
    env,
  );
}
