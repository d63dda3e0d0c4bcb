import { logEvent } from '@grantline/core';
import { StateMismatchError } from '../errors/oauth2-client-error.js';
import type { RedirectParams } from '../utils/oauth-types.js';

/**
 * Parameters parsed from a raw query or fragment: every key maps to the
 * list of its values, in order of appearance.
 * @public
 */
export type ParsedRedirectParams = Record<string, string[]>;

/**
 * Parses a query string or URL fragment into a multi-value mapping.
 *
 * A leading `?` or `#` is ignored. Repeated keys keep every value; blank
 * values are kept as empty strings. Every key becomes an own property, so
 * names such as `constructor` or `__proto__` parse like any other.
 * @example
 * ```typescript
 * parseRedirectParams('#access_token=abc&state=xyz')
 * // => { access_token: ['abc'], state: ['xyz'] }
 * ```
 * @public
 */
export function parseRedirectParams(raw: string): ParsedRedirectParams {
  const trimmed = raw.startsWith('?') || raw.startsWith('#') ? raw.slice(1) : raw;
  const values = new Map<string, string[]>();
  for (const [key, value] of new URLSearchParams(trimmed)) {
    const existing = values.get(key);
    if (existing) {
      existing.push(value);
    } else {
      values.set(key, [value]);
    }
  }
  return Object.fromEntries(values);
}

/**
 * First value of a parameter that may be single- or multi-valued.
 * @internal
 */
function firstValue(
  value: string | readonly string[] | undefined,
): string | undefined {
  if (typeof value === 'string' || value === undefined) {
    return value;
  }
  return value[0];
}

/**
 * Checks the `state` of an authorization response (RFC 6749 §10.12).
 *
 * The first `state` value must equal `expectedState` exactly. When neither
 * side has a state the check passes: callers that did not send one cannot
 * verify one, so always send a state. A blank `state=` counts as a state
 * (the empty string), so it fails against a missing `expectedState`.
 * @param params - The redirect's query or fragment, raw or already parsed
 * @param expectedState - The state sent with the authorization request
 * @returns The parameters, parsed if a string was given
 * @throws {StateMismatchError} When the states differ
 * @example
 * ```typescript
 * const params = validateAuthorization('state=xyz&code=abc', 'xyz');
 * // => { state: ['xyz'], code: ['abc'] }
 * ```
 * @public
 */
export function validateAuthorization(
  params: string,
  expectedState?: string | null,
): ParsedRedirectParams;
export function validateAuthorization<T extends RedirectParams>(
  params: T,
  expectedState?: string | null,
): T;
export function validateAuthorization(
  params: string | RedirectParams,
  expectedState?: string | null,
): RedirectParams {
  const parsed = typeof params === 'string' ? parseRedirectParams(params) : params;

  const received = Object.hasOwn(parsed, 'state')
    ? firstValue(parsed.state)
    : undefined;
  if (received !== (expectedState ?? undefined)) {
    logEvent('warn', 'oauth2:state_mismatch', {
      hasReceivedState: received !== undefined,
      hasExpectedState: expectedState !== undefined && expectedState !== null,
    });
    throw new StateMismatchError();
  }

  return parsed;
}
