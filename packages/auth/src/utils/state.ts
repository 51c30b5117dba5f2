import { randomBytes } from 'crypto';

/**
 * URL-safe base64 without padding (RFC 4648 section 5).
 */
export function base64URLEncode(buffer: Buffer): string {
  return buffer.toString('base64').replace(/\+/g, '-').replace(/\//g, '_').replace(/=/g, '');
}

/**
 * Random CSRF `state` value: 16 bytes, base64url encoded (22 characters).
 */
export function generateState(): string {
  return base64URLEncode(randomBytes(16));
}
