import { z } from 'zod';

export const UserAgentSchema = z.object({
  appName: z.string().min(1),
  appVersion: z.string().min(1).optional(),
  appUrl: z.string().url().optional(),
});

export type UserAgentZod = z.infer<typeof UserAgentSchema>;
