export {
  TokenResponseSchema,
  AccessTokenSignerSchema,
  NonRefreshableTokenSignerSchema,
} from './TokenResponseSchema.js';
export type { TokenResponseZod } from './TokenResponseSchema.js';
export { TokenCredentialsSchema } from './TokenCredentialsSchema.js';
export { parseScopes } from './parseScopes.js';
