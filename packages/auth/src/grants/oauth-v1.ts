import {
  RedirectErrorCodes,
  type Consumer,
  type OAuthV1Token,
  type OAuthV1Verifier,
  type RedirectErrorCode,
  type TokenCredentials,
} from '@authwire/models';
import { TokenCredentialsSchema } from '@authwire/schemas';
import { decoders, err, formDecoder, ok, type Result } from '@authwire/core';
import { applySigner, type SignOptions } from '../signers/apply-signer.js';
import { oauthV1Signer } from '../signers/signers.js';
import type { PreparedRequest } from './prepared-request.js';
import { redirectParameters } from './redirect-params.js';

const credentialDecoders = decoders({ success: formDecoder(TokenCredentialsSchema) });

/** Out-of-band callback: the verifier is shown to the user instead of redirected */
export const OUT_OF_BAND = 'oob';

/**
 * Temporary-credential request (RFC 5849 section 2.1), signed with the
 * consumer alone.
 */
function requestTokenRequest(
  serverUri: string,
  consumer: Consumer,
  callback: string = OUT_OF_BAND,
  options: SignOptions = {},
): PreparedRequest<TokenCredentials> {
  const signer = oauthV1Signer(consumer, undefined, { oauth_callback: callback });
  return {
    request: applySigner(signer, { method: 'POST', uri: serverUri, headers: {} }, options),
    decoders: credentialDecoders,
  };
}

/**
 * Resource-owner authorization URI (RFC 5849 section 2.2)
 */
function authorizationUri(serverUri: string, requestToken: OAuthV1Token): string {
  const uri = new URL(serverUri);
  uri.searchParams.set('oauth_token', requestToken.value);
  return uri.toString();
}

/**
 * Reads `oauth_token` and `oauth_verifier` from the callback URI.
 */
function parseAuthorizationCallback(
  redirectUri: string,
): Result<OAuthV1Verifier, RedirectErrorCode> {
  const params = redirectParameters(redirectUri);
  const token = params.get('oauth_token');
  const verifier = params.get('oauth_verifier');
  if (token === undefined || verifier === undefined) {
    return err(RedirectErrorCodes.MISSING_REQUIRED_QUERY_PARAMETERS);
  }
  return ok({ token, verifier });
}

/**
 * Token-credential request (RFC 5849 section 2.3), signed with the consumer
 * and the authorized temporary credentials.
 */
function accessTokenRequest(
  serverUri: string,
  consumer: Consumer,
  requestToken: OAuthV1Token,
  verifier: string,
  options: SignOptions = {},
): PreparedRequest<TokenCredentials> {
  const signer = oauthV1Signer(consumer, requestToken, { oauth_verifier: verifier });
  return {
    request: applySigner(signer, { method: 'POST', uri: serverUri, headers: {} }, options),
    decoders: credentialDecoders,
  };
}

/**
 * OAuth 1.0a redirection-based authorization
 */
export const OAuthV1 = {
  requestTokenRequest,
  authorizationUri,
  parseAuthorizationCallback,
  accessTokenRequest,
} as const;
