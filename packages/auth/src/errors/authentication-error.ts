/**
 * Local misuse and configuration failures
 */
export enum AuthErrorCode {
  INVALID_CONFIG = 'invalid_config',
  CONFIG_NOT_FOUND = 'config_not_found',
  ENV_RESOLUTION_FAILED = 'env_resolution_failed',
  MISSING_REFRESH_TOKEN = 'missing_refresh_token',
  UNKNOWN_ERROR = 'unknown_error',
}

/**
 * Thrown for programmer or configuration mistakes. Protocol failures never
 * throw; they come back as `Result` values. Messages are scrubbed of
 * credential-looking substrings.
 */
export class AuthenticationError extends Error {
  public readonly code: AuthErrorCode;
  public readonly cause?: Error;

  public constructor(
    message: string,
    code: AuthErrorCode = AuthErrorCode.UNKNOWN_ERROR,
    cause?: Error,
  ) {
    super(AuthenticationError.sanitizeMessage(message));
    this.name = 'AuthenticationError';
    this.code = code;
    this.cause = cause;

    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }

  private static sanitizeMessage(message: string): string {
    return message
      .replace(/\b[a-zA-Z0-9+/]{20,}={0,2}/g, '[REDACTED_TOKEN]')
      .replace(/\bBearer\s+[a-zA-Z0-9._~+/-]+=*/gi, 'Bearer [REDACTED]')
      .replace(/\bBasic\s+[a-zA-Z0-9+/]+=*/gi, 'Basic [REDACTED]')
      .replace(/\baccess_token[=:]\s*[^\s&]+/gi, 'access_token=[REDACTED]')
      .replace(/\brefresh_token[=:]\s*[^\s&]+/gi, 'refresh_token=[REDACTED]')
      .replace(/\bclient_secret[=:]\s*[^\s&]+/gi, 'client_secret=[REDACTED]')
      .replace(/\boauth_token_secret[=:]\s*[^\s&]+/gi, 'oauth_token_secret=[REDACTED]');
  }

  public static invalidConfig(description: string, cause?: Error): AuthenticationError {
    return new AuthenticationError(
      `Invalid client configuration: ${description}`,
      AuthErrorCode.INVALID_CONFIG,
      cause,
    );
  }

  public static configNotFound(path: string, cause?: Error): AuthenticationError {
    return new AuthenticationError(
      `Client configuration file not readable: ${path}`,
      AuthErrorCode.CONFIG_NOT_FOUND,
      cause,
    );
  }

  public static envResolutionFailed(cause: Error): AuthenticationError {
    return new AuthenticationError(
      `Client configuration references an unresolvable variable: ${cause.message}`,
      AuthErrorCode.ENV_RESOLUTION_FAILED,
      cause,
    );
  }

  public static missingRefreshToken(): AuthenticationError {
    return new AuthenticationError(
      'Access token signer carries no refresh token',
      AuthErrorCode.MISSING_REFRESH_TOKEN,
    );
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}
