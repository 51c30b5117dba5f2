import {
  RedirectErrorCodes,
  ResponseTypes,
  type AuthorizationRequest,
  type NonRefreshableTokenSigner,
} from '@authwire/models';
import { err, ok, type Result } from '@authwire/core';
import { parseScopes } from '../utils/scope.js';
import { buildAuthorizationUri } from './authorization-uri.js';
import { redirectParameters, validateState } from './redirect-params.js';

function authorizationUri(request: AuthorizationRequest, serverUri: string): string {
  return buildAuthorizationUri(serverUri, request, ResponseTypes.TOKEN);
}

/**
 * Reads the access token from an implicit-grant redirect (RFC 6749 section
 * 4.2.2). Checks in order: state, `error`, then each required field.
 * `expires_in` must be a non-negative integer.
 */
function parseAccessTokenResponse(
  request: AuthorizationRequest,
  redirectUri: string,
  now: number = Date.now(),
): Result<NonRefreshableTokenSigner, string> {
  const params = redirectParameters(redirectUri);

  const state = validateState(request.state, params);
  if (!state.ok) return state;

  const error = params.get('error');
  if (error !== undefined) return err(error);

  const accessToken = params.get('access_token');
  if (accessToken === undefined) return err(RedirectErrorCodes.MISSING_ACCESS_TOKEN);

  const tokenType = params.get('token_type');
  if (tokenType === undefined) return err(RedirectErrorCodes.MISSING_TOKEN_TYPE);

  const rawExpiresIn = params.get('expires_in');
  if (rawExpiresIn === undefined) return err(RedirectErrorCodes.MISSING_EXPIRES_IN);

  const expiresIn = Number(rawExpiresIn);
  if (!/^\d+$/.test(rawExpiresIn) || !Number.isSafeInteger(expiresIn)) {
    return err(RedirectErrorCodes.INVALID_EXPIRES_IN);
  }

  return ok({
    type: 'non-refreshable-token',
    accessToken: { value: accessToken },
    tokenType,
    expiresIn,
    scope: { values: parseScopes(params.get('scope')) },
    generatedAt: now,
  });
}

/**
 * Implicit grant (RFC 6749 section 4.2)
 */
export const ImplicitGrant = {
  authorizationUri,
  parseAccessTokenResponse,
} as const;
