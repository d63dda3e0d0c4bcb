import { ConfigurationError } from '../../errors/oauth2-client-error.js';

/**
 * Variables that `${VAR}` references resolve against.
 * @public
 */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Nesting limit for references inside variable values and defaults */
const MAX_REFERENCE_DEPTH = 10;

/**
 * Expands `${VAR}` and `${VAR:default}` references in a configuration value.
 *
 * Names are upper-case identifiers (`[A-Z_][A-Z0-9_]*`); anything else is
 * left as written. A variable's value and a default may themselves hold
 * references, which are expanded in turn.
 * @param value - Configuration value as written
 * @param env - Variables to resolve against, `process.env` by default
 * @throws {ConfigurationError} When a variable without default is undefined,
 *   references itself, or nests too deep
 * @example
 * ```typescript
 * expandEnvRefs('${ISSUER:https://auth.example.com}/token', {})
 * // => 'https://auth.example.com/token'
 * ```
 * @public
 */
export function expandEnvRefs(value: string, env: EnvSource = process.env): string {
  return expand(value, env, new Set(), 0);
}

function expand(
  value: string,
  env: EnvSource,
  resolving: ReadonlySet<string>,
  depth: number,
): string {
  if (depth > MAX_REFERENCE_DEPTH) {
    throw new ConfigurationError(
      `Environment variable references nest deeper than ${MAX_REFERENCE_DEPTH} levels`,
    );
  }

  return value.replace(
    /\$\{([A-Z_][A-Z0-9_]*)(?::([^}]*))?\}/g,
    (_match: string, name: string, fallback: string | undefined) => {
      if (resolving.has(name)) {
        throw new ConfigurationError(
          `Circular reference detected in environment variable '${name}'`,
        );
      }
      const resolved = env[name] ?? fallback;
      if (resolved === undefined) {
        throw new ConfigurationError(
          `Required environment variable '${name}' is not defined`,
        );
      }
      return expand(resolved, env, new Set(resolving).add(name), depth + 1);
    },
  );
}
