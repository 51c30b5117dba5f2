import { z } from 'zod';
import type { TokenCredentials } from '@authwire/models';

/**
 * OAuth 1.0a temporary/token credential response (RFC 5849 sections 2.1 and 2.3),
 * read from an `application/x-www-form-urlencoded` body.
 * @public
 */
export const TokenCredentialsSchema = z
  .object({
    oauth_token: z.string().min(1),
    oauth_token_secret: z.string(),
    oauth_callback_confirmed: z.string().optional(),
    user_id: z.string().optional(),
  })
  .transform(
    (body): TokenCredentials => ({
      token: { value: body.oauth_token, secret: body.oauth_token_secret },
      callbackConfirmed:
        body.oauth_callback_confirmed === undefined
          ? undefined
          : body.oauth_callback_confirmed === 'true',
      userId: body.user_id,
    }),
  );
