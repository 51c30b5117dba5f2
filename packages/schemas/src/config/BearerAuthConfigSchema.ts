import { z } from 'zod';

export const BearerAuthConfigSchema = z.object({
  type: z.literal('bearer'),
  accessToken: z.string().min(1),
  tokenType: z.string().min(1).optional(),
  expiresIn: z.number().int().nonnegative().optional(),
});

export type BearerAuthConfigZod = z.infer<typeof BearerAuthConfigSchema>;
