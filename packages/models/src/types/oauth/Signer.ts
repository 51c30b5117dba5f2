import type { ClientPassword } from './ClientPassword.js';
import type { Consumer, OAuthV1Token } from './OAuthV1.js';
import type { Scope } from './Scope.js';
import type { AccessToken, RefreshToken } from './Tokens.js';

/**
 * No authorization; requests are sent as they are.
 */
export interface DisabledSigner {
  type: 'disabled';
}

/**
 * OAuth 1.0a HMAC-SHA1 signature (RFC 5849).
 *
 * Signs with the consumer alone (two-legged, request-token calls) or with the
 * consumer plus a temporary/token credential.
 */
export interface BasicSignature {
  type: 'oauth1-basic';
  consumer: Consumer;
  token?: OAuthV1Token;
  /** Extra `oauth_*` protocol parameters, e.g. `oauth_callback` or `oauth_verifier` */
  protocolParams?: Readonly<Record<string, string>>;
}

/**
 * HTTP Basic client authentication, used on token-endpoint requests only
 */
export interface ClientPasswordAuthentication {
  type: 'client-password';
  clientPassword: ClientPassword;
}

interface TokenSignerFields {
  accessToken: AccessToken;
  /** Token type as issued, usually `bearer` */
  tokenType: string;
  /** Lifetime in seconds counted from `generatedAt` */
  expiresIn: number;
  scope: Scope;
  /** Epoch milliseconds at which the token was received */
  generatedAt: number;
}

/**
 * OAuth 2.0 access token that may carry a refresh token.
 *
 * Never refreshed automatically: callers check expiry and run a refresh
 * request themselves.
 */
export interface AccessTokenSigner extends TokenSignerFields {
  type: 'access-token';
  refreshToken?: RefreshToken;
}

/**
 * OAuth 2.0 access token without a refresh token (implicit and client
 * credentials grants); a new grant is needed once it expires.
 */
export interface NonRefreshableTokenSigner extends TokenSignerFields {
  type: 'non-refreshable-token';
}

/**
 * Any token signer applying `Authorization: Bearer`
 */
export type TokenSigner = AccessTokenSigner | NonRefreshableTokenSigner;

/**
 * Discriminated union of every way a request can be authorized
 */
export type Signer =
  | DisabledSigner
  | BasicSignature
  | ClientPasswordAuthentication
  | AccessTokenSigner
  | NonRefreshableTokenSigner;
