/**
 * Pino root logger with path-based redaction of credentials
 */

import pino from 'pino';

/**
 * Redaction paths shared by the root logger and its tests.
 * Covers OAuth 2.0 token bodies, OAuth 1.0a credentials and header maps.
 * @public
 */
export const REDACT_PATHS: readonly string[] = [
  // OAuth 2.0
  'access_token',
  '*.access_token',
  'refresh_token',
  '*.refresh_token',
  'client_secret',
  '*.client_secret',
  'clientSecret',
  '*.clientSecret',
  'authorizationCode',
  '*.authorizationCode',
  'state',
  '*.state',

  // OAuth 1.0a
  'oauth_token_secret',
  '*.oauth_token_secret',
  'oauth_signature',
  '*.oauth_signature',
  'oauth_verifier',
  '*.oauth_verifier',

  // Headers and generic credentials
  'authorization',
  '*.authorization',
  '*.headers.authorization',
  '*.headers.Authorization',
  'token',
  '*.token',
  'password',
  '*.password',
  'secret',
  '*.secret',
];

/**
 * Root logger instance. Silent by default; raise the level to see output.
 *
 * @example
 * ```typescript
 * rootLogger.level = 'debug';
 * rootLogger.info({ client_secret: 'test-secret' }); // { client_secret: '[REDACTED]' }
 * ```
 * @public
 */
const rootLogger = pino({
  level: 'silent',
  redact: {
    paths: [...REDACT_PATHS],
    censor: '[REDACTED]',
    remove: false,
  },
  serializers: {
    ...pino.stdSerializers,
    err: pino.stdSerializers.err,
  },
});

export { rootLogger };
