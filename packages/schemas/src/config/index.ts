export { NoAuthConfigSchema } from './NoAuthConfigSchema.js';
export { BearerAuthConfigSchema } from './BearerAuthConfigSchema.js';
export { ConsumerSchema, OAuthV1AuthConfigSchema } from './OAuthV1AuthConfigSchema.js';
export { ClientPasswordAuthConfigSchema } from './ClientPasswordAuthConfigSchema.js';
export { AuthConfigSchema } from './AuthConfigSchema.js';
export { UserAgentSchema } from './UserAgentSchema.js';
export { ClientConfigSchema } from './ClientConfigSchema.js';

export type { NoAuthConfigZod } from './NoAuthConfigSchema.js';
export type { BearerAuthConfigZod } from './BearerAuthConfigSchema.js';
export type { OAuthV1AuthConfigZod } from './OAuthV1AuthConfigSchema.js';
export type { ClientPasswordAuthConfigZod } from './ClientPasswordAuthConfigSchema.js';
export type { AuthConfigZod } from './AuthConfigSchema.js';
export type { UserAgentZod } from './UserAgentSchema.js';
export type { ClientConfigZod } from './ClientConfigSchema.js';
