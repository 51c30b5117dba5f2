import { RedirectErrorCodes, type RedirectErrorCode } from '@authwire/models';
import { err, ok, type Result } from '@authwire/core';

/**
 * Parameters of a redirect URI, read from its query and its fragment. A
 * parameter present in both takes the fragment's value. An unparsable URI
 * yields no parameters.
 */
export function redirectParameters(redirectUri: string): Map<string, string> {
  const params = new Map<string, string>();

  let url: URL;
  try {
    url = new URL(redirectUri);
  } catch {
    return params;
  }

  for (const [key, value] of url.searchParams) params.set(key, value);
  for (const [key, value] of new URLSearchParams(url.hash.slice(1))) params.set(key, value);
  return params;
}

/**
 * When a `state` was sent it must come back unchanged. Runs before any other
 * redirect check.
 */
export function validateState(
  expected: string | undefined,
  params: ReadonlyMap<string, string>,
): Result<void, RedirectErrorCode> {
  if (expected === undefined) return ok(undefined);

  const received = params.get('state');
  if (received === undefined) {
    return err(RedirectErrorCodes.MISSING_REQUIRED_STATE_PARAMETER);
  }
  if (received !== expected) {
    return err(RedirectErrorCodes.STATE_PARAMETER_MISMATCH);
  }
  return ok(undefined);
}
