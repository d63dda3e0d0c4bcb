/**
 * Tests for pino-setup redaction
 *
 * Verifies that credentials and tokens are redacted via fast-redact
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Logger } from 'pino';
import { createLogger, levelFromEnv } from './pino-setup.js';

describe('Pino Redaction', () => {
  let testLogger: Logger;
  let logs: string[];

  beforeEach(() => {
    logs = [];
    testLogger = createLogger('info', {
      write: (msg: string) => {
        logs.push(msg);
      },
    });
  });

  describe('Client authentication', () => {
    it('redacts client_secret', () => {
      testLogger.info({ client_secret: 'test-secret' });

      const logged = JSON.parse(logs[0]);
      expect(logged.client_secret).toBe('[REDACTED]');
    });

    it('redacts camelCase clientSecret in nested config', () => {
      testLogger.info({
        config: {
          clientId: 'test-client',
          clientSecret: 'test-secret',
        },
      });

      const logged = JSON.parse(logs[0]);
      expect(logged.config.clientSecret).toBe('[REDACTED]');
      expect(logged.config.clientId).toBe('test-client');
    });

    it('redacts resource owner password', () => {
      testLogger.info({ data: { username: 'alice', password: 'test-password' } });

      const logged = JSON.parse(logs[0]);
      expect(logged.data.password).toBe('[REDACTED]');
      expect(logged.data.username).toBe('alice');
    });

    it('redacts Authorization headers', () => {
      testLogger.info({ headers: { Authorization: 'Basic dGVzdA==' } });

      const logged = JSON.parse(logs[0]);
      expect(logged.headers.Authorization).toBe('[REDACTED]');
    });
  });

  describe('Tokens', () => {
    it('redacts tokens in nested token response', () => {
      testLogger.info({
        response: {
          access_token: 'test-access-token',
          refresh_token: 'test-refresh-token',
          expires_in: 3600,
        },
      });

      const logged = JSON.parse(logs[0]);
      expect(logged.response.access_token).toBe('[REDACTED]');
      expect(logged.response.refresh_token).toBe('[REDACTED]');
      expect(logged.response.expires_in).toBe(3600);
    });
  });

  describe('Authorization redirect', () => {
    it('redacts code and state', () => {
      testLogger.info({ data: { code: 'test-code', state: 'test-state' } });

      const logged = JSON.parse(logs[0]);
      expect(logged.data.code).toBe('[REDACTED]');
      expect(logged.data.state).toBe('[REDACTED]');
    });
  });

  describe('Edge Cases', () => {
    it('preserves non-sensitive fields', () => {
      testLogger.info({
        data: {
          tokenEndpoint: 'https://auth.example.com/token',
          grantType: 'client_credentials',
        },
      });

      const logged = JSON.parse(logs[0]);
      expect(logged.data.tokenEndpoint).toBe('https://auth.example.com/token');
      expect(logged.data.grantType).toBe('client_credentials');
    });

    it('keeps the errorCode field of error records', () => {
      testLogger.error({
        event: 'error:token_request',
        data: { message: 'socket hang up', errorCode: 'ECONNRESET' },
      });

      const logged = JSON.parse(logs[0]);
      expect(logged.data.errorCode).toBe('ECONNRESET');
      expect(logged.data.message).toBe('socket hang up');
    });

    it('writes nothing below the configured level', () => {
      testLogger.debug({ event: 'hidden' });

      expect(logs).toHaveLength(0);
    });
  });
});

describe('levelFromEnv', () => {
  it('defaults to silent', () => {
    expect(levelFromEnv({})).toBe('silent');
  });

  it('accepts known levels case-insensitively', () => {
    expect(levelFromEnv({ GRANTLINE_LOG_LEVEL: 'DEBUG' })).toBe('debug');
  });

  it('falls back to silent for unknown levels', () => {
    expect(levelFromEnv({ GRANTLINE_LOG_LEVEL: 'verbose' })).toBe('silent');
  });
});
