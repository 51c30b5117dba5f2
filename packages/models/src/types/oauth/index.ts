/**
 * OAuth value types shared by the signer, grant and client modules
 */
export * from './AuthorizationRequest.js';
export * from './ClientPassword.js';
export * from './OAuthV1.js';
export * from './Scope.js';
export * from './Signer.js';
export * from './Tokens.js';
