import { GrantTypes, type ClientPassword, type NonRefreshableTokenSigner } from '@authwire/models';
import { NonRefreshableTokenSignerSchema } from '@authwire/schemas';
import { decoders, jsonDecoder } from '@authwire/core';
import type { PreparedRequest } from './prepared-request.js';
import { buildTokenRequest } from './token-request.js';

const tokenDecoders = decoders({ success: jsonDecoder(NonRefreshableTokenSignerSchema) });

function accessTokenRequest(
  serverUri: string,
  clientPassword: ClientPassword,
): PreparedRequest<NonRefreshableTokenSigner> {
  return {
    request: buildTokenRequest(
      serverUri,
      [['grant_type', GrantTypes.CLIENT_CREDENTIALS]],
      clientPassword,
    ),
    decoders: tokenDecoders,
  };
}

/**
 * Client Credentials grant (RFC 6749 section 4.4). Body is exactly
 * `grant_type=client_credentials`.
 */
export const ClientCredentialsGrant = {
  accessTokenRequest,
} as const;
