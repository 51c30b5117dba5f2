export { AuthenticationError, AuthErrorCode } from './authentication-error.js';
