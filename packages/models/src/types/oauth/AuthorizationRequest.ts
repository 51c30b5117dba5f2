/**
 * Parameters of an authorization request (RFC 6749 sections 4.1.1 and 4.2.1).
 *
 * The same request value is used to build the authorization URI and later to
 * validate the redirect response, so `state` travels with it.
 */
export interface AuthorizationRequest {
  /** Client identifier sent as `client_id` */
  clientId: string;
  /** Redirection endpoint; must match the one registered with the server */
  redirectUri: string;
  /** Opaque CSRF value, expected back unchanged in the redirect */
  state?: string;
  /** Requested scopes, sent space-joined; omitted when empty */
  scopes: readonly string[];
}
