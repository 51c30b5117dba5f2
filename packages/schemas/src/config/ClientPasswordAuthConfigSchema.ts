import { z } from 'zod';

export const ClientPasswordAuthConfigSchema = z.object({
  type: z.literal('client-password'),
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
});

export type ClientPasswordAuthConfigZod = z.infer<typeof ClientPasswordAuthConfigSchema>;
