import { z } from 'zod';
import { NoAuthConfigSchema } from './NoAuthConfigSchema.js';
import { BearerAuthConfigSchema } from './BearerAuthConfigSchema.js';
import { OAuthV1AuthConfigSchema } from './OAuthV1AuthConfigSchema.js';
import { ClientPasswordAuthConfigSchema } from './ClientPasswordAuthConfigSchema.js';

export const AuthConfigSchema = z.discriminatedUnion('type', [
  NoAuthConfigSchema,
  OAuthV1AuthConfigSchema,
  ClientPasswordAuthConfigSchema,
  BearerAuthConfigSchema,
]);

export type AuthConfigZod = z.infer<typeof AuthConfigSchema>;
