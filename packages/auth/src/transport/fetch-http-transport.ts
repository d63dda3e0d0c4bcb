import type { HttpRequest, HttpResponse, HttpTransport } from './http-transport.js';

/**
 * Options for {@link FetchHttpTransport}.
 * @public
 */
export interface FetchHttpTransportOptions {
  /** Abort each request after this many milliseconds. No timeout when unset. */
  timeoutMs?: number;
}

/**
 * Default transport, built on the global `fetch` of Node.js.
 * @public
 */
export class FetchHttpTransport implements HttpTransport {
  private readonly timeoutMs?: number;

  public constructor(options: FetchHttpTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs;
  }

  public async send(request: HttpRequest): Promise<HttpResponse> {
    return fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal:
        this.timeoutMs === undefined
          ? undefined
          : AbortSignal.timeout(this.timeoutMs),
    });
  }
}
