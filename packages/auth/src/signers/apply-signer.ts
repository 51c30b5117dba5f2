import type { HttpRequest, Signer } from '@authwire/models';
import { logEvent, mergeHeaders, type RequestSigner } from '@authwire/core';
import { basicAuthorization, bearerAuthorization } from './credentials.js';
import { oauthV1Authorization, type OAuthV1Clock } from './oauth-v1-signature.js';

export interface SignOptions {
  /** Fixes nonce and timestamp of OAuth 1.0a signatures */
  clock?: OAuthV1Clock;
}

function withAuthorization(request: HttpRequest, authorization: string): HttpRequest {
  return {
    ...request,
    headers: mergeHeaders(request.headers, { Authorization: authorization }),
  };
}

function assertNever(signer: never): never {
  throw new TypeError(`Unsupported signer: ${JSON.stringify(signer)}`);
}

/**
 * Returns a copy of `request` authorized with `signer`; the input is not
 * modified. An existing `Authorization` header is replaced.
 */
export function applySigner(
  signer: Signer,
  request: HttpRequest,
  options: SignOptions = {},
): HttpRequest {
  switch (signer.type) {
    case 'disabled':
      logEvent('warn', 'signer:unsigned-request', {
        method: request.method,
        uri: request.uri,
      });
      return { ...request, headers: { ...request.headers } };
    case 'oauth1-basic':
      return withAuthorization(request, oauthV1Authorization(signer, request, options.clock));
    case 'client-password':
      return withAuthorization(request, basicAuthorization(signer.clientPassword));
    case 'access-token':
    case 'non-refreshable-token':
      return withAuthorization(request, bearerAuthorization(signer.accessToken));
    default:
      return assertNever(signer);
  }
}

/**
 * Adapts a {@link Signer} to the pipeline's {@link RequestSigner}.
 */
export function bindSigner(signer: Signer, options: SignOptions = {}): RequestSigner {
  return (request) => applySigner(signer, request, options);
}
