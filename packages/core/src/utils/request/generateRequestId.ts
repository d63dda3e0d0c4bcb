import { randomBytes } from 'node:crypto';

/**
 * Correlation id for one outbound request: `<prefix>_<epoch ms>_<8 hex>`.
 *
 * Only ever written to log records, never sent to a server.
 * @param prefix - Kind of request, e.g. `token`
 * @public
 */
export function generateRequestId(prefix: string): string {
  return [prefix, Date.now(), randomBytes(4).toString('hex')].join('_');
}
