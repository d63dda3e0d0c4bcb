export { isRetryableError } from './is-retryable-error.js';
export { isTokenErrorResponse } from './is-token-error-response.js';
