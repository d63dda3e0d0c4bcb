import type { ScopeInput } from '../oauth-types.js';

/**
 * Normalizes a scope to the space-delimited string RFC 6749 §3.3 expects.
 *
 * Strings pass through unchanged, including the empty string that some
 * providers read as "default scope". Collections are joined with single
 * spaces in iteration order.
 * @param scope - Scope string or collection of scopes
 * @returns Space-delimited scope string
 * @example
 * ```typescript
 * normalizeScope(['openid', 'profile']) // => 'openid profile'
 * normalizeScope('openid profile')      // => 'openid profile'
 * normalizeScope(new Set(['a', 'b']))   // => 'a b'
 * ```
 * @public
 */
export function normalizeScope(scope: ScopeInput): string {
  if (typeof scope === 'string') {
    return scope;
  }
  return [...scope].join(' ');
}
