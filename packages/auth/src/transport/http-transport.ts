/**
 * HTTP capability the client sends token requests through.
 *
 * Implementations own TLS, timeouts, proxies and cancellation. Failures
 * below HTTP (DNS, refused connection, timeout) are thrown as-is; the client
 * does not catch them.
 * @public
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * @public
 */
export interface HttpRequest {
  method: 'POST';
  url: string;
  headers: Record<string, string>;
  /** `application/x-www-form-urlencoded` body */
  body: string;
}

/**
 * Subset of the Fetch API `Response` the client reads.
 * @public
 */
export interface HttpResponse {
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}
