import { z } from 'zod';

export const ConsumerSchema = z.object({
  key: z.string().min(1),
  secret: z.string().min(1),
});

export const OAuthV1AuthConfigSchema = z.object({
  type: z.literal('oauth1'),
  consumer: ConsumerSchema,
  token: z
    .object({
      value: z.string().min(1),
      secret: z.string(),
    })
    .optional(),
});

export type OAuthV1AuthConfigZod = z.infer<typeof OAuthV1AuthConfigSchema>;
