/**
 * Tests for pino-setup redaction
 */

import { describe, it, expect, beforeEach } from 'vitest';
import pino from 'pino';
import { REDACT_PATHS, rootLogger } from './pino-setup.js';

describe('Pino Redaction', () => {
  let testLogger: pino.Logger;
  let logs: string[];

  beforeEach(() => {
    logs = [];
    testLogger = pino(
      {
        redact: {
          paths: [...REDACT_PATHS],
          censor: '[REDACTED]',
          remove: false,
        },
      },
      {
        write: (msg: string) => {
          logs.push(msg);
        },
      },
    );
  });

  it('is silent by default', () => {
    expect(rootLogger.level).toBe('silent');
  });

  describe('OAuth 2.0', () => {
    it('redacts access_token', () => {
      testLogger.info({ access_token: 'test-access' });

      const logged = JSON.parse(logs[0]);
      expect(logged.access_token).toBe('[REDACTED]');
    });

    it('redacts nested client_secret and keeps siblings', () => {
      testLogger.info({ data: { client_secret: 'test-secret', client_id: 'client' } });

      const logged = JSON.parse(logs[0]);
      expect(logged.data.client_secret).toBe('[REDACTED]');
      expect(logged.data.client_id).toBe('client');
    });

    it('redacts the authorization code and state', () => {
      testLogger.info({ data: { authorizationCode: 'test-code', state: 'test-state' } });

      const logged = JSON.parse(logs[0]);
      expect(logged.data.authorizationCode).toBe('[REDACTED]');
      expect(logged.data.state).toBe('[REDACTED]');
    });

    it('keeps error codes readable', () => {
      testLogger.info({ event: 'error:transport:send', data: { code: 'connection_failed' } });

      const logged = JSON.parse(logs[0]);
      expect(logged.data.code).toBe('connection_failed');
    });
  });

  describe('OAuth 1.0a', () => {
    it('redacts oauth_token_secret', () => {
      testLogger.info({ data: { oauth_token: 'tok', oauth_token_secret: 'test-secret' } });

      const logged = JSON.parse(logs[0]);
      expect(logged.data.oauth_token).toBe('tok');
      expect(logged.data.oauth_token_secret).toBe('[REDACTED]');
    });

    it('redacts consumer secrets', () => {
      testLogger.info({ consumer: { key: 'consumer-key', secret: 'test-secret' } });

      const logged = JSON.parse(logs[0]);
      expect(logged.consumer.key).toBe('consumer-key');
      expect(logged.consumer.secret).toBe('[REDACTED]');
    });
  });

  describe('Headers', () => {
    it('redacts Authorization inside a headers map', () => {
      testLogger.info({
        request: { headers: { Authorization: 'Basic YWJjOnh5eg==', Accept: 'application/json' } },
      });

      const logged = JSON.parse(logs[0]);
      expect(logged.request.headers.Authorization).toBe('[REDACTED]');
      expect(logged.request.headers.Accept).toBe('application/json');
    });
  });
});
