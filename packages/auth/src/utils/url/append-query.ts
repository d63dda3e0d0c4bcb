/**
 * Appends form-encoded parameters to an endpoint URL.
 *
 * Uses `?` when the endpoint has no query component yet and `&` otherwise,
 * so pre-registered endpoints such as `https://idp.example.com/authorize?tenant=x`
 * keep their own parameters. The endpoint is returned unchanged when there
 * is nothing to append.
 * @param endpoint - Endpoint URL as configured
 * @param params - Already compacted parameters
 * @public
 */
export function appendQuery(
  endpoint: string,
  params: Readonly<Record<string, string>>,
): string {
  const query = new URLSearchParams(params).toString();
  if (!query) {
    return endpoint;
  }
  const separator = endpoint.includes('?') ? '&' : '?';
  return `${endpoint}${separator}${query}`;
}
