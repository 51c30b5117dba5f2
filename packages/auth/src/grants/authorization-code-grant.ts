import {
  GrantTypes,
  RedirectErrorCodes,
  ResponseTypes,
  type AccessTokenSigner,
  type AuthorizationCode,
  type AuthorizationRequest,
  type ClientPassword,
  type RefreshToken,
} from '@authwire/models';
import { AccessTokenSignerSchema } from '@authwire/schemas';
import { decoders, err, jsonDecoder, ok, type Result } from '@authwire/core';
import { AuthenticationError } from '../errors/authentication-error.js';
import { joinScopesForRefresh } from '../utils/scope.js';
import { buildAuthorizationUri } from './authorization-uri.js';
import type { PreparedRequest } from './prepared-request.js';
import { redirectParameters, validateState } from './redirect-params.js';
import { buildTokenRequest } from './token-request.js';

const accessTokenDecoders = decoders({ success: jsonDecoder(AccessTokenSignerSchema) });

export function authorizationUri(request: AuthorizationRequest, serverUri: string): string {
  return buildAuthorizationUri(serverUri, request, ResponseTypes.CODE);
}

/**
 * Reads the authorization code from the redirect the user agent came back with.
 *
 * State is checked first. After that, a `code` wins over an `error`; the
 * server's `error` value is returned as-is.
 */
export function parseAuthorizationResponse(
  request: AuthorizationRequest,
  redirectUri: string,
): Result<AuthorizationCode, string> {
  const params = redirectParameters(redirectUri);

  const state = validateState(request.state, params);
  if (!state.ok) return state;

  const code = params.get('code');
  if (code !== undefined) return ok({ value: code });

  const error = params.get('error');
  if (error !== undefined) return err(error);

  return err(RedirectErrorCodes.MISSING_REQUIRED_QUERY_PARAMETERS);
}

/**
 * Token request exchanging an authorization code (RFC 6749 section 4.1.3).
 * `redirect_uri` is sent only when given, and must then equal the one used
 * in the authorization request.
 */
export function accessTokenRequest(
  serverUri: string,
  code: AuthorizationCode,
  redirectUri: string | undefined,
  clientPassword: ClientPassword,
): PreparedRequest<AccessTokenSigner> {
  const params: Array<[string, string]> = [
    ['grant_type', GrantTypes.AUTHORIZATION_CODE],
    ['code', code.value],
  ];
  if (redirectUri !== undefined) params.push(['redirect_uri', redirectUri]);

  return {
    request: buildTokenRequest(serverUri, params, clientPassword),
    decoders: accessTokenDecoders,
  };
}

/**
 * Refresh request (RFC 6749 section 6). Scopes, when given, are comma-joined.
 */
export function refreshTokenRequest(
  serverUri: string,
  refreshToken: RefreshToken,
  scopes: readonly string[],
  clientPassword: ClientPassword,
): PreparedRequest<AccessTokenSigner> {
  const params: Array<[string, string]> = [
    ['grant_type', GrantTypes.REFRESH_TOKEN],
    ['refresh_token', refreshToken.value],
  ];
  if (scopes.length > 0) params.push(['scope', joinScopesForRefresh(scopes)]);

  return {
    request: buildTokenRequest(serverUri, params, clientPassword),
    decoders: accessTokenDecoders,
  };
}

/**
 * {@link refreshTokenRequest} for the refresh token and scopes of `signer`.
 * @throws {AuthenticationError} when the signer holds no refresh token
 */
export function refreshSignerRequest(
  serverUri: string,
  signer: AccessTokenSigner,
  clientPassword: ClientPassword,
): PreparedRequest<AccessTokenSigner> {
  if (!signer.refreshToken) {
    throw AuthenticationError.missingRefreshToken();
  }
  return refreshTokenRequest(serverUri, signer.refreshToken, signer.scope.values, clientPassword);
}

/**
 * Authorization Code grant (RFC 6749 section 4.1)
 */
export const AuthorizationCodeGrant = {
  authorizationUri,
  parseAuthorizationResponse,
  accessTokenRequest,
  refreshTokenRequest,
  refreshSignerRequest,
} as const;
