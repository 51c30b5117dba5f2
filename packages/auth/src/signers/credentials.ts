import type { AccessToken, ClientPassword } from '@authwire/models';

/**
 * `Basic` credentials for client authentication (RFC 6749 section 2.3.1).
 *
 * @example
 * ```typescript
 * basicAuthorization({ clientId: 'abc', clientSecret: 'xyz' }); // 'Basic YWJjOnh5eg=='
 * ```
 */
export function basicAuthorization(clientPassword: ClientPassword): string {
  const credentials = Buffer.from(
    `${clientPassword.clientId}:${clientPassword.clientSecret}`,
    'utf8',
  ).toString('base64');
  return `Basic ${credentials}`;
}

export function bearerAuthorization(accessToken: AccessToken): string {
  return `Bearer ${accessToken.value}`;
}
