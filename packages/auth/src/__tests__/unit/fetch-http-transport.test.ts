import { describe, it, expect, vi, afterEach } from 'vitest';
import { FetchHttpTransport } from '../../transport/fetch-http-transport.js';

describe('FetchHttpTransport', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const request = {
    method: 'POST',
    url: 'https://auth.example.com/oauth/token',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body: 'grant_type=client_credentials&client_id=test-client-id',
  } as const;

  it('should forward the request to fetch', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response('{"access_token":"mock-access-token"}', { status: 200 }),
    );
    vi.stubGlobal('fetch', fetchMock);

    const response = await new FetchHttpTransport().send(request);

    expect(fetchMock).toHaveBeenCalledWith(request.url, {
      method: 'POST',
      headers: request.headers,
      body: request.body,
      signal: undefined,
    });
    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({
      access_token: 'mock-access-token',
    });
  });

  it('should attach a timeout signal when configured', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('{}'));
    vi.stubGlobal('fetch', fetchMock);

    await new FetchHttpTransport({ timeoutMs: 5000 }).send(request);

    const init: unknown = fetchMock.mock.calls[0]?.[1];
    expect(init).toMatchObject({ signal: expect.any(AbortSignal) });
  });

  it('should propagate fetch failures', async () => {
    const failure = new TypeError('fetch failed');
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(failure));

    await expect(new FetchHttpTransport().send(request)).rejects.toBe(failure);
  });
});
