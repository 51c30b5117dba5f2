export { AuthClient } from './auth-client.js';
export type { AuthClientExtras, AuthClientOptions, Outcome } from './auth-client.js';
export { formatUserAgent } from './user-agent.js';
