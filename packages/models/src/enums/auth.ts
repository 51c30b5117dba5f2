/**
 * Errors raised locally while reading an authorization redirect.
 * Server-reported `error` values are returned verbatim alongside these.
 */
export const RedirectErrorCodes = {
  STATE_PARAMETER_MISMATCH: 'state_parameter_mismatch',
  MISSING_REQUIRED_STATE_PARAMETER: 'missing_required_state_parameter',
  MISSING_REQUIRED_QUERY_PARAMETERS: 'missing_required_query_parameters',
  MISSING_ACCESS_TOKEN: 'missing_access_token',
  MISSING_TOKEN_TYPE: 'missing_token_type',
  MISSING_EXPIRES_IN: 'missing_expires_in',
  INVALID_EXPIRES_IN: 'invalid_expires_in',
} as const;

export type RedirectErrorCode =
  (typeof RedirectErrorCodes)[keyof typeof RedirectErrorCodes];

/**
 * Standard OAuth 2.0 grant types
 */
export const GrantTypes = {
  AUTHORIZATION_CODE: 'authorization_code',
  REFRESH_TOKEN: 'refresh_token',
  CLIENT_CREDENTIALS: 'client_credentials',
} as const;

/**
 * Standard OAuth 2.0 response types
 */
export const ResponseTypes = {
  CODE: 'code',
  TOKEN: 'token',
} as const;

export type ResponseType = (typeof ResponseTypes)[keyof typeof ResponseTypes];
