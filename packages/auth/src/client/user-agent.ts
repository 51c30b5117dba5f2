import type { UserAgent } from '@authwire/models';

/**
 * `User-Agent` header value: `appName[/appVersion][ (appUrl)]`.
 *
 * @example
 * ```typescript
 * formatUserAgent({ appName: 'demo', appVersion: '1.0', appUrl: 'https://example.com' });
 * // 'demo/1.0 (https://example.com)'
 * ```
 */
export function formatUserAgent(userAgent: UserAgent): string {
  const version = userAgent.appVersion ? `/${userAgent.appVersion}` : '';
  const url = userAgent.appUrl ? ` (${userAgent.appUrl})` : '';
  return `${userAgent.appName}${version}${url}`;
}
