// Errors
export * from './errors/oauth2-client-error.js';

// Client and grants
export * from './client/oauth2-client.js';
export * from './grants/index.js';

// Redirect handling
export * from './validation/validate-authorization.js';

// Transport
export * from './transport/index.js';

export * from './schemas.js';
export * from './utils/index.js';

export { resolveClientConfig, clientConfigFromEnv } from './utils/oauth-utils.js';
