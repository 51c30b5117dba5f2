export { AuthorizationCodeGrant } from './authorization-code-grant.js';
export { ImplicitGrant } from './implicit-grant.js';
export { ClientCredentialsGrant } from './client-credentials-grant.js';
export { OAuthV1, OUT_OF_BAND } from './oauth-v1.js';
export { buildAuthorizationUri } from './authorization-uri.js';
export { redirectParameters, validateState } from './redirect-params.js';
export type { PreparedRequest } from './prepared-request.js';
