/**
 * OAuth 1.0a client credentials (RFC 5849 section 1.1)
 */
export interface Consumer {
  readonly key: string;
  readonly secret: string;
}

/**
 * OAuth 1.0a temporary or token credentials
 */
export interface OAuthV1Token {
  readonly value: string;
  readonly secret: string;
}

/**
 * Decoded response of a temporary-credential or token-credential request
 */
export interface TokenCredentials {
  token: OAuthV1Token;
  /** `oauth_callback_confirmed`, only present on request-token responses */
  callbackConfirmed?: boolean;
  /** Provider-specific user id some servers add to access-token responses */
  userId?: string;
}

/**
 * Callback parameters returned after the resource owner authorized a request token
 */
export interface OAuthV1Verifier {
  token: string;
  verifier: string;
}
