import { z } from 'zod';
import type { AccessTokenSigner, NonRefreshableTokenSigner } from '@authwire/models';
import { parseScopes } from './parseScopes.js';

/**
 * Token endpoint success body (RFC 6749 section 5.1) as sent on the wire.
 *
 * @public
 */
export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().min(1),
  expires_in: z.number().int().nonnegative(),
  refresh_token: z.string().min(1).optional(),
  scope: z.string().optional(),
});

export type TokenResponseZod = z.infer<typeof TokenResponseSchema>;

/**
 * Decodes a token endpoint body into an {@link AccessTokenSigner}.
 *
 * `generatedAt` is stamped with the time of decoding, so expiry is counted
 * from when the response was read rather than from when it was issued.
 *
 * @example
 * ```typescript
 * const signer = AccessTokenSignerSchema.parse({
 *   access_token: 'abc',
 *   token_type: 'bearer',
 *   expires_in: 3600,
 *   refresh_token: 'def',
 *   scope: 'read write',
 * });
 * // signer.scope.values => ['read', 'write']
 * ```
 * @public
 */
export const AccessTokenSignerSchema = TokenResponseSchema.transform(
  (body): AccessTokenSigner => ({
    type: 'access-token',
    accessToken: { value: body.access_token },
    tokenType: body.token_type,
    expiresIn: body.expires_in,
    scope: { values: parseScopes(body.scope) },
    refreshToken:
      body.refresh_token === undefined ? undefined : { value: body.refresh_token },
    generatedAt: Date.now(),
  }),
);

/**
 * Decodes a token endpoint body into a {@link NonRefreshableTokenSigner};
 * a `refresh_token` in the body, if any, is ignored.
 * @public
 */
export const NonRefreshableTokenSignerSchema = TokenResponseSchema.transform(
  (body): NonRefreshableTokenSigner => ({
    type: 'non-refreshable-token',
    accessToken: { value: body.access_token },
    tokenType: body.token_type,
    expiresIn: body.expires_in,
    scope: { values: parseScopes(body.scope) },
    generatedAt: Date.now(),
  }),
);
