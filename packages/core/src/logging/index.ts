/**
 * Logging infrastructure exports
 */

export { rootLogger, REDACT_PATHS } from './pino-setup.js';
export { logEvent, logError } from '../logger.js';
export type { LogLevel } from '../logger.js';
