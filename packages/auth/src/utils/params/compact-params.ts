import type {
  ExtraParams,
  ParamValue,
  RequestParams,
} from '../oauth-types.js';
import { normalizeScope } from '../scope/normalize-scope.js';

/**
 * Converts one parameter value to its wire form.
 *
 * @returns The string to send, or undefined when the parameter must be
 *   omitted (unset, or an empty collection)
 * @internal
 */
function toWireValue(value: ParamValue): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  const joined = normalizeScope(value);
  return joined === '' ? undefined : joined;
}

/**
 * Drops unset parameters and flattens collections.
 *
 * `undefined` and `null` mean "omit", never "send empty": neither reaches
 * the wire. An explicit empty string is kept. Collections (usually `scope`)
 * are joined with single spaces; an empty collection is omitted.
 * Key order is preserved, and every key, `__proto__` included, is an own
 * property of the result.
 * @param params - Parameters as given by the caller
 * @returns Parameters ready for form encoding
 * @example
 * ```typescript
 * compactParams({ scope: ['read', 'write'], state: undefined, prompt: '' })
 * // => { scope: 'read write', prompt: '' }
 * ```
 * @public
 */
export function compactParams(params: RequestParams): Record<string, string> {
  const entries: Array<[string, string]> = [];
  for (const [key, value] of Object.entries(params)) {
    const wire = toWireValue(value);
    if (wire !== undefined) {
      entries.push([key, wire]);
    }
  }
  return Object.fromEntries(entries);
}

/**
 * Combines a method's named parameters with caller-supplied extras.
 *
 * Both are compacted first. Named parameters come first and win on a name
 * collision, so an unset named value still lets an extra of the same name
 * through.
 * @param named - Parameters the grant method names explicitly
 * @param extra - Provider-specific parameters
 * @public
 */
export function withExtra(
  named: RequestParams,
  extra: ExtraParams = {},
): Record<string, string> {
  const merged = new Map(Object.entries(compactParams(named)));
  for (const [key, value] of Object.entries(compactParams(extra))) {
    if (!merged.has(key)) {
      merged.set(key, value);
    }
  }
  return Object.fromEntries(merged);
}

/**
 * Checks that a decoded JSON value is a plain object.
 * @public
 */
export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
