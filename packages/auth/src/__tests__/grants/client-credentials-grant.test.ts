import { describe, it, expect, beforeEach } from 'vitest';
import { ClientCredentialsGrant } from '../../grants/client-credentials-grant.js';
import { isTokenErrorResponse } from '../../utils/error/is-token-error-response.js';
import {
  BASIC_AUTH,
  createMockTransport,
  createTestClient,
  lastRequest,
  setupJsonResponse,
  type MockTransport,
} from '../test-utils.js';

describe('ClientCredentialsGrant', () => {
  let transport: MockTransport;
  let grant: ClientCredentialsGrant;

  beforeEach(() => {
    transport = createMockTransport();
    grant = new ClientCredentialsGrant(createTestClient(transport));
  });

  it('should request a token with Basic authentication', async () => {
    const response = await grant.getToken({ scope: 'api:read' });

    const request = lastRequest(transport);
    expect(request.headers.Authorization).toBe(BASIC_AUTH);
    expect(request.body).toBe(
      'grant_type=client_credentials&client_id=test-client-id&scope=api%3Aread',
    );
    expect(response.access_token).toBe('mock-access-token');
  });

  it('should send a space-separated scope and return invalid_scope as data', async () => {
    setupJsonResponse(transport, 400, { error: 'invalid_scope' });

    const response = await grant.getToken({ scope: 'read write' });

    expect(lastRequest(transport).body).toBe(
      'grant_type=client_credentials&client_id=test-client-id&scope=read+write',
    );
    expect(response).toEqual({ error: 'invalid_scope' });
  });

  it('should return an error answer as data', async () => {
    setupJsonResponse(transport, 401, {
      error: 'invalid_client',
      error_description: 'Client authentication failed',
    });

    const response = await grant.getToken();

    expect(isTokenErrorResponse(response)).toBe(true);
    expect(response).toEqual({
      error: 'invalid_client',
      error_description: 'Client authentication failed',
    });
  });

  it('should pass provider parameters through extra', async () => {
    await grant.getToken({ extra: { audience: 'https://api.example.com' } });

    expect(lastRequest(transport).body).toBe(
      'grant_type=client_credentials&client_id=test-client-id&audience=https%3A%2F%2Fapi.example.com',
    );
  });

  it('should send extras named after Object.prototype members', async () => {
    await grant.getToken({ extra: { toString: 'v', constructor: 'w' } });

    expect(lastRequest(transport).body).toBe(
      'grant_type=client_credentials&client_id=test-client-id&toString=v&constructor=w',
    );
  });

  it('should take scope from extra when the named scope is unset', async () => {
    await grant.getToken({ extra: { scope: 'fallback' } });

    expect(lastRequest(transport).body).toBe(
      'grant_type=client_credentials&client_id=test-client-id&scope=fallback',
    );
  });

  it('should prefer the named scope over extra', async () => {
    await grant.getToken({ scope: 'named', extra: { scope: 'fallback' } });

    expect(lastRequest(transport).body).toBe(
      'grant_type=client_credentials&client_id=test-client-id&scope=named',
    );
  });
});
