import { describe, it, expect } from 'vitest';
import type { HttpRequest } from '@authwire/models';
import { applySigner, bindSigner } from '../../signers/apply-signer.js';
import {
  bearerSigner,
  clientPasswordSigner,
  disabledSigner,
  oauthV1Signer,
} from '../../signers/signers.js';
import { expectedSignature, FIXED_CLOCK } from '../test-utils.js';

const consumer = { key: 'consumer-key', secret: 'consumer-secret' };
const token = { value: 'token-value', secret: 'token-secret' };

describe('applySigner', () => {
  const request: HttpRequest = {
    method: 'GET',
    uri: 'https://api.example.com/v1/items?page=2',
    headers: { Accept: 'application/json' },
  };

  describe('disabled', () => {
    it('should return an equal copy of the request', () => {
      const signed = applySigner(disabledSigner, request);

      expect(signed).toEqual(request);
      expect(signed).not.toBe(request);
    });
  });

  describe('client-password', () => {
    it('should add the exact Basic credentials', () => {
      const signed = applySigner(
        clientPasswordSigner({ clientId: 'abc', clientSecret: 'xyz' }),
        request,
      );

      expect(signed.headers).toEqual({
        Accept: 'application/json',
        Authorization: 'Basic YWJjOnh5eg==',
      });
    });

    it('should encode credentials as UTF-8', () => {
      const signed = applySigner(
        clientPasswordSigner({ clientId: 'clïent', clientSecret: 'test-secret' }),
        request,
      );

      expect(signed.headers.Authorization).toBe(
        `Basic ${Buffer.from('clïent:test-secret', 'utf8').toString('base64')}`,
      );
    });
  });

  describe('token signers', () => {
    it('should add a Bearer header and replace an existing Authorization', () => {
      const signed = applySigner(bearerSigner('tok123'), {
        ...request,
        headers: { authorization: 'Basic old' },
      });

      expect(signed.headers).toEqual({ Authorization: 'Bearer tok123' });
    });

    it('should leave the input request untouched', () => {
      applySigner(bearerSigner('tok123'), request);

      expect(request.headers).toEqual({ Accept: 'application/json' });
    });
  });

  describe('oauth1-basic', () => {
    it('should sign with consumer and token, covering query parameters', () => {
      const signed = applySigner(oauthV1Signer(consumer, token), request, { clock: FIXED_CLOCK });

      const signature = expectedSignature(
        'GET',
        'https://api.example.com/v1/items',
        {
          oauth_consumer_key: 'consumer-key',
          oauth_nonce: 'fixed-nonce',
          oauth_signature_method: 'HMAC-SHA1',
          oauth_timestamp: '1700000000',
          oauth_token: 'token-value',
          oauth_version: '1.0',
          page: '2',
        },
        'consumer-secret&token-secret',
      );

      expect(signed.headers.Authorization).toBe(
        'OAuth oauth_consumer_key="consumer-key", oauth_nonce="fixed-nonce", ' +
          `oauth_signature="${encodeURIComponent(signature)}", oauth_signature_method="HMAC-SHA1", ` +
          'oauth_timestamp="1700000000", oauth_token="token-value", oauth_version="1.0"',
      );
    });

    it('should sign with the consumer alone and include protocol parameters', () => {
      const signed = applySigner(
        oauthV1Signer(consumer, undefined, { oauth_callback: 'oob' }),
        { method: 'POST', uri: 'https://auth.example.com/oauth/request_token', headers: {} },
        { clock: FIXED_CLOCK },
      );

      const signature = expectedSignature(
        'POST',
        'https://auth.example.com/oauth/request_token',
        {
          oauth_callback: 'oob',
          oauth_consumer_key: 'consumer-key',
          oauth_nonce: 'fixed-nonce',
          oauth_signature_method: 'HMAC-SHA1',
          oauth_timestamp: '1700000000',
          oauth_version: '1.0',
        },
        'consumer-secret&',
      );

      expect(signed.headers.Authorization).toBe(
        'OAuth oauth_callback="oob", oauth_consumer_key="consumer-key", oauth_nonce="fixed-nonce", ' +
          `oauth_signature="${encodeURIComponent(signature)}", oauth_signature_method="HMAC-SHA1", ` +
          'oauth_timestamp="1700000000", oauth_version="1.0"',
      );
    });

    it('should include form body parameters in the signature', () => {
      const signed = applySigner(
        oauthV1Signer(consumer, token),
        {
          method: 'POST',
          uri: 'https://api.example.com/v1/status',
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          body: 'status=hello%20world',
        },
        { clock: FIXED_CLOCK },
      );

      const signature = expectedSignature(
        'POST',
        'https://api.example.com/v1/status',
        {
          oauth_consumer_key: 'consumer-key',
          oauth_nonce: 'fixed-nonce',
          oauth_signature_method: 'HMAC-SHA1',
          oauth_timestamp: '1700000000',
          oauth_token: 'token-value',
          oauth_version: '1.0',
          status: 'hello world',
        },
        'consumer-secret&token-secret',
      );

      expect(signed.headers.Authorization).toContain(
        `oauth_signature="${encodeURIComponent(signature)}"`,
      );
      expect(signed.body).toBe('status=hello%20world');
    });

    it('should be deterministic for a fixed clock', () => {
      const signer = oauthV1Signer(consumer, token);

      const first = applySigner(signer, request, { clock: FIXED_CLOCK });
      const second = applySigner(signer, request, { clock: FIXED_CLOCK });

      expect(second.headers.Authorization).toBe(first.headers.Authorization);
    });

    it('should use a fresh nonce without a clock', () => {
      const signer = oauthV1Signer(consumer, token);

      const first = applySigner(signer, request);
      const second = applySigner(signer, request);

      expect(second.headers.Authorization).not.toBe(first.headers.Authorization);
    });
  });
});

describe('bindSigner', () => {
  it('should adapt a signer to a request signer function', () => {
    const sign = bindSigner(bearerSigner('tok123'));

    expect(sign({ method: 'GET', uri: 'https://api.example.com/', headers: {} }).headers).toEqual({
      Authorization: 'Bearer tok123',
    });
  });
});
