import type { Scope } from '@authwire/models';

export { parseScopes } from '@authwire/schemas';

/** Authorization request and token response form (RFC 6749 section 3.3) */
export function joinScopesForUri(scopes: readonly string[]): string {
  return scopes.join(' ');
}

/**
 * Refresh request form. Comma-joined, unlike {@link joinScopesForUri}, to
 * match the providers this client talks to.
 */
export function joinScopesForRefresh(scopes: readonly string[]): string {
  return scopes.join(',');
}

export function toScope(values: readonly string[]): Scope {
  return { values: [...values] };
}

/**
 * Order-insensitive scope equality; duplicates count once.
 */
export function scopesEqual(a: Scope, b: Scope): boolean {
  const left = new Set(a.values);
  const right = new Set(b.values);
  if (left.size !== right.size) return false;
  for (const value of left) {
    if (!right.has(value)) return false;
  }
  return true;
}
