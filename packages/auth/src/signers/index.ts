export { applySigner, bindSigner } from './apply-signer.js';
export type { SignOptions } from './apply-signer.js';
export { basicAuthorization, bearerAuthorization } from './credentials.js';
export { oauthV1Authorization } from './oauth-v1-signature.js';
export type { OAuthV1Clock } from './oauth-v1-signature.js';
export {
  bearerSigner,
  clientPasswordSigner,
  disabledSigner,
  isTokenExpired,
  isTokenSigner,
  oauthV1Signer,
  tokenExpiresAt,
} from './signers.js';
export type { BearerSignerOptions } from './signers.js';
