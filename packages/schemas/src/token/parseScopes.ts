/**
 * Splits a space-delimited `scope` value (RFC 6749 section 3.3) into its
 * tokens, dropping empty segments.
 *
 * @example
 * ```typescript
 * parseScopes('read  write') // => ['read', 'write']
 * parseScopes(undefined)     // => []
 * ```
 * @public
 */
export function parseScopes(scope?: string | null): string[] {
  if (!scope) return [];
  return scope.split(' ').filter(Boolean);
}
