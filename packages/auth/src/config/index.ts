export {
  getDefaultConfigPath,
  loadClientConfig,
  parseClientConfig,
} from './load-client-config.js';
export type { LoadClientConfigOptions, LoadedClientConfig } from './load-client-config.js';
export { createAuthClient } from './create-auth-client.js';
