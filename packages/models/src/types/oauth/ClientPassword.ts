/**
 * Client credentials registered with the authorization server
 * (RFC 6749 section 2.3.1).
 */
export interface ClientPassword {
  /** Client identifier issued at registration */
  readonly clientId: string;
  /** Client secret; only ever sent inside a Basic credential */
  readonly clientSecret: string;
}
