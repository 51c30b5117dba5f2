/**
 * Outcome of an operation that can fail without throwing.
 *
 * @example
 * ```typescript
 * const parsed = parseAuthorizationResponse(request, redirectUri);
 * if (parsed.ok) {
 *   exchange(parsed.value);
 * } else {
 *   logEvent('warn', 'auth:redirect-rejected', { reason: parsed.error });
 * }
 * ```
 */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({
  ok: true,
  value,
});

export const err = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
});
