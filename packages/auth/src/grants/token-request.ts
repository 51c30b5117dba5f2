import type { ClientPassword, HttpRequest } from '@authwire/models';
import { MediaTypes } from '@authwire/core';
import { applySigner } from '../signers/apply-signer.js';
import { clientPasswordSigner } from '../signers/signers.js';

/**
 * Form POST to a token endpoint, authenticated with HTTP Basic client
 * credentials. Body parameters keep the order given.
 */
export function buildTokenRequest(
  serverUri: string,
  params: ReadonlyArray<readonly [string, string]>,
  clientPassword: ClientPassword,
): HttpRequest {
  const body = new URLSearchParams();
  for (const [name, value] of params) body.append(name, value);

  return applySigner(clientPasswordSigner(clientPassword), {
    method: 'POST',
    uri: serverUri,
    headers: { 'Content-Type': MediaTypes.FORM },
    body: body.toString(),
  });
}
