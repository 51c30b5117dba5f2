import type { AuthorizationRequest, ResponseType } from '@authwire/models';
import { joinScopesForUri } from '../utils/scope.js';

/**
 * Authorization endpoint URI (RFC 6749 sections 4.1.1 and 4.2.1). Query
 * parameters already on `serverUri` are kept; `scope` is left out when no
 * scopes are requested.
 */
export function buildAuthorizationUri(
  serverUri: string,
  request: AuthorizationRequest,
  responseType: ResponseType,
): string {
  const uri = new URL(serverUri);
  uri.searchParams.set('client_id', request.clientId);
  uri.searchParams.set('response_type', responseType);
  uri.searchParams.set('redirect_uri', request.redirectUri);

  if (request.state !== undefined) {
    uri.searchParams.set('state', request.state);
  }

  if (request.scopes.length > 0) {
    uri.searchParams.set('scope', joinScopesForUri(request.scopes));
  }

  return uri.toString();
}
