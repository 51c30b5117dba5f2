/**
 * Set of scope identifiers.
 *
 * Equality is order-insensitive; the wire form depends on where the scope is
 * sent (space-joined in authorization URIs, comma-joined on refresh).
 */
export interface Scope {
  readonly values: readonly string[];
}
