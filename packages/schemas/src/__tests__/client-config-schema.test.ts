import { describe, it, expect } from 'vitest';
import { AuthConfigSchema, ClientConfigSchema, UserAgentSchema } from '../config/index.js';

describe('AuthConfigSchema', () => {
  it('should accept a no-auth configuration', () => {
    const result = AuthConfigSchema.parse({ type: 'none' });
    expect(result).toEqual({ type: 'none' });
  });

  it('should accept an oauth1 configuration with a token', () => {
    const result = AuthConfigSchema.parse({
      type: 'oauth1',
      consumer: { key: 'consumer-key', secret: 'test-secret' },
      token: { value: 'token-value', secret: 'token-secret' },
    });

    expect(result.type).toBe('oauth1');
    if (result.type === 'oauth1') {
      expect(result.consumer.key).toBe('consumer-key');
      expect(result.token?.value).toBe('token-value');
    }
  });

  it('should reject a client-password configuration without a secret', () => {
    expect(() =>
      AuthConfigSchema.parse({ type: 'client-password', clientId: 'client' }),
    ).toThrow();
  });

  it('should reject an unknown auth type', () => {
    expect(() => AuthConfigSchema.parse({ type: 'digest' })).toThrow();
  });

  it('should accept a bearer configuration without token type', () => {
    const result = AuthConfigSchema.parse({ type: 'bearer', accessToken: 'abc' });
    expect(result).toEqual({ type: 'bearer', accessToken: 'abc' });
  });
});

describe('UserAgentSchema', () => {
  it('should reject a malformed app url', () => {
    expect(() =>
      UserAgentSchema.parse({ appName: 'demo', appUrl: 'not a url' }),
    ).toThrow();
  });
});

describe('ClientConfigSchema', () => {
  it('should default auth to none', () => {
    const result = ClientConfigSchema.parse({ userAgent: { appName: 'demo' } });
    expect(result.auth).toEqual({ type: 'none' });
    expect(result.transport).toBeUndefined();
  });

  it('should normalize the flat consumer section', () => {
    const result = ClientConfigSchema.parse({
      consumer: {
        appName: 'demo',
        appVersion: '1.2.0',
        appUrl: 'https://example.com',
        key: 'consumer-key',
        secret: 'test-secret',
      },
    });

    expect(result.userAgent).toEqual({
      appName: 'demo',
      appVersion: '1.2.0',
      appUrl: 'https://example.com',
    });
    expect(result.auth).toEqual({
      type: 'oauth1',
      consumer: { key: 'consumer-key', secret: 'test-secret' },
    });
  });

  it('should keep an explicit auth section over the consumer one', () => {
    const result = ClientConfigSchema.parse({
      consumer: { appName: 'demo', key: 'consumer-key', secret: 'test-secret' },
      auth: { type: 'bearer', accessToken: 'abc' },
    });

    expect(result.auth).toEqual({ type: 'bearer', accessToken: 'abc' });
  });

  it('should reject a non-positive timeout', () => {
    expect(() =>
      ClientConfigSchema.parse({
        userAgent: { appName: 'demo' },
        transport: { timeoutMs: 0 },
      }),
    ).toThrow();
  });
});
