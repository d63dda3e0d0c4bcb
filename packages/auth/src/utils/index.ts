/**
 * OAuth utilities export module.
 *
 * - Request parameter compaction and scope normalization
 * - Endpoint query assembly
 * - Error classification for token requests and responses
 * - `${VAR}` expansion in configuration values
 *
 * @public
 */

export * from './oauth-types.js';

// Parameters
export * from './params/compact-params.js';
export * from './scope/normalize-scope.js';
export * from './url/append-query.js';

// Error handling utilities
export * from './error/index.js';

// Configuration
export * from './env/expand-env-refs.js';
