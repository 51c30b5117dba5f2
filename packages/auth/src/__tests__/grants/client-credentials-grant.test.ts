import { describe, it, expect } from 'vitest';
import { parseMediaType } from '@authwire/core';
import { ClientCredentialsGrant } from '../../grants/client-credentials-grant.js';
import { expectOk } from '../test-utils.js';

describe('ClientCredentialsGrant', () => {
  const prepared = ClientCredentialsGrant.accessTokenRequest('https://auth.example.com/token', {
    clientId: 'abc',
    clientSecret: 'xyz',
  });

  it('should send exactly grant_type=client_credentials', () => {
    expect(prepared.request.body).toBe('grant_type=client_credentials');
    expect(prepared.request.method).toBe('POST');
    expect(prepared.request.uri).toBe('https://auth.example.com/token');
  });

  it('should authenticate with byte-exact Basic credentials', () => {
    expect(prepared.request.headers).toEqual({
      'Content-Type': 'application/x-www-form-urlencoded',
      Authorization: 'Basic YWJjOnh5eg==',
    });
  });

  it('should decode into a non-refreshable token', () => {
    const json = parseMediaType('application/json');
    if (!json) throw new Error('media type');

    const signer = expectOk(
      prepared.decoders.success.decode(
        '{"access_token":"abc","token_type":"bearer","expires_in":600,"refresh_token":"ignored"}',
        json,
      ),
    );

    expect(signer.type).toBe('non-refreshable-token');
    expect(signer.accessToken.value).toBe('abc');
    expect(signer.expiresIn).toBe(600);
  });
});
