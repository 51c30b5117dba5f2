/**
 * Identifies the calling application in the `User-Agent` header.
 * Rendered as `appName[/appVersion][ (appUrl)]`.
 */
export interface UserAgent {
  appName: string;
  appVersion?: string;
  appUrl?: string;
}

/**
 * Transport tuning carried by client configuration
 */
export interface TransportOptions {
  /** Abort the request after this many milliseconds */
  timeoutMs?: number;
}

export interface NoAuthConfig {
  type: 'none';
}

export interface OAuthV1AuthConfig {
  type: 'oauth1';
  consumer: { key: string; secret: string };
  token?: { value: string; secret: string };
}

export interface ClientPasswordAuthConfig {
  type: 'client-password';
  clientId: string;
  clientSecret: string;
}

export interface BearerAuthConfig {
  type: 'bearer';
  accessToken: string;
  tokenType?: string;
  /** Remaining lifetime in seconds when the file was written; unbounded when omitted */
  expiresIn?: number;
}

/**
 * Discriminated union of the authorization strategies a config file can select
 */
export type AuthConfig =
  | NoAuthConfig
  | OAuthV1AuthConfig
  | ClientPasswordAuthConfig
  | BearerAuthConfig;

/**
 * Client configuration as read from disk, after `${VAR}` resolution
 */
export interface ClientConfig {
  userAgent: UserAgent;
  auth: AuthConfig;
  transport?: TransportOptions;
}

/**
 * Options for resolving `${VAR}` and `${VAR:default}` patterns in config values
 */
export interface EnvVarPatternResolverConfig {
  /** Nesting limit for variables whose values contain further patterns */
  maxDepth?: number;
  /** Throw when a variable is unset and has no default; otherwise keep the pattern */
  strict?: boolean;
  /** Variable source, `process.env` unless given */
  envSource?: Record<string, string | undefined>;
}
