/**
 * Access token issued by the authorization server
 */
export interface AccessToken {
  readonly value: string;
}

/**
 * Refresh token; long-lived and owned by the caller
 */
export interface RefreshToken {
  readonly value: string;
}

/**
 * Single-use authorization code returned in the authorization redirect
 */
export interface AuthorizationCode {
  readonly value: string;
}
