export {
  joinScopesForRefresh,
  joinScopesForUri,
  parseScopes,
  scopesEqual,
  toScope,
} from './scope.js';
export { base64URLEncode, generateState } from './state.js';
