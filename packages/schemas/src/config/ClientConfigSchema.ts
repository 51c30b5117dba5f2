import { z } from 'zod';
import { UserAgentSchema } from './UserAgentSchema.js';
import { AuthConfigSchema } from './AuthConfigSchema.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Rewrites the flat `consumer` layout into `userAgent` + `auth`.
 *
 * ```json
 * { "consumer": { "appName": "x", "appVersion": "1.0", "key": "k", "secret": "s" } }
 * ```
 * becomes `{ userAgent: { appName, appVersion }, auth: { type: 'oauth1', consumer: { key, secret } } }`.
 * Explicit `userAgent` / `auth` entries win over the derived ones.
 */
function normalizeConsumerSection(input: unknown): unknown {
  if (!isRecord(input) || !isRecord(input.consumer)) {
    return input;
  }

  const { consumer, ...rest } = input;
  const { appName, appVersion, appUrl, key, secret } = consumer;

  return {
    userAgent: { appName, appVersion, appUrl },
    auth: { type: 'oauth1', consumer: { key, secret } },
    ...rest,
  };
}

const ClientConfigObjectSchema = z.object({
  userAgent: UserAgentSchema,
  auth: AuthConfigSchema.default({ type: 'none' }),
  transport: z
    .object({
      timeoutMs: z.number().int().positive().optional(),
    })
    .optional(),
});

export const ClientConfigSchema = z.preprocess(
  normalizeConsumerSection,
  ClientConfigObjectSchema,
);

export type ClientConfigZod = z.infer<typeof ClientConfigSchema>;
