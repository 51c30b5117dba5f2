import type { ClientConfig } from '@authwire/models';
import { FetchTransport } from '@authwire/core';
import { AuthClient, type AuthClientExtras } from '../client/auth-client.js';
import { bearerSigner } from '../signers/signers.js';

/**
 * Builds the client a configuration describes. A transport in `extras`
 * replaces the one built from `config.transport`.
 */
export function createAuthClient(config: ClientConfig, extras: AuthClientExtras = {}): AuthClient {
  const transport = extras.transport ?? new FetchTransport({ timeoutMs: config.transport?.timeoutMs });
  const options: AuthClientExtras = { ...extras, transport };
  const { userAgent, auth } = config;

  switch (auth.type) {
    case 'none':
      return AuthClient.disabled(userAgent, options);
    case 'oauth1':
      return AuthClient.oauthV1(userAgent, auth.consumer, auth.token, options);
    case 'client-password':
      return AuthClient.clientPassword(
        userAgent,
        { clientId: auth.clientId, clientSecret: auth.clientSecret },
        options,
      );
    case 'bearer':
      return AuthClient.accessToken(
        userAgent,
        bearerSigner(auth.accessToken, { tokenType: auth.tokenType, expiresIn: auth.expiresIn }),
        options,
      );
  }
}
