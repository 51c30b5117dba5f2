export * from './oauth/index.js';

export type { HttpMethod, HttpRequest, RawResponse, TypedResponse } from './http.js';

export type {
  AuthConfig,
  BearerAuthConfig,
  ClientConfig,
  ClientPasswordAuthConfig,
  NoAuthConfig,
  OAuthV1AuthConfig,
  TransportOptions,
  UserAgent,
} from './client.js';

export type { EnvVarPatternResolverConfig } from './client.js';
