import { randomBytes } from 'crypto';

/**
 * Request id of the form `[prefix_]timestamp_randomhex`, used to correlate
 * the log events of one request.
 * @public
 */
export function generateRequestId(prefix?: string): string {
  const randomSuffix = randomBytes(4).toString('hex');
  return `${prefix ? `${prefix}_` : ''}${Date.now()}_${randomSuffix}`;
}
