import { createHmac } from 'crypto';
import OAuth from 'oauth-1.0a';
import type { BasicSignature, Consumer, HttpRequest } from '@authwire/models';
import { formatMediaType, getHeader, MediaTypes, parseMediaType } from '@authwire/core';

/**
 * Source of `oauth_nonce` and `oauth_timestamp` (seconds). Defaults to the
 * library's random nonce and the current time.
 */
export interface OAuthV1Clock {
  nonce(): string;
  timestamp(): number;
}

function createOAuth(consumer: Consumer, clock?: OAuthV1Clock): OAuth {
  const oauth = new OAuth({
    consumer: { key: consumer.key, secret: consumer.secret },
    signature_method: 'HMAC-SHA1',
    hash_function(baseString: string, key: string) {
      return createHmac('sha1', key).update(baseString).digest('base64');
    },
  });

  if (clock) {
    oauth.getNonce = () => clock.nonce();
    oauth.getTimeStamp = () => clock.timestamp();
  }

  return oauth;
}

/**
 * Parameters of a form-encoded body; they take part in the signature base
 * string (RFC 5849 section 3.4.1.3.1).
 */
function formParameters(request: HttpRequest): Record<string, string> {
  const contentType = getHeader(request.headers, 'content-type');
  const mediaType = contentType === undefined ? undefined : parseMediaType(contentType);
  if (!request.body || !mediaType || formatMediaType(mediaType) !== MediaTypes.FORM) {
    return {};
  }
  return Object.fromEntries(new URLSearchParams(request.body));
}

/**
 * `Authorization: OAuth ...` header value for an HMAC-SHA1 signed request.
 *
 * The signature covers the protocol parameters, the query string of
 * `request.uri` and form body parameters. Extra protocol parameters of the
 * signer (`oauth_callback`, `oauth_verifier`) are signed and sent in the header.
 */
export function oauthV1Authorization(
  signer: BasicSignature,
  request: HttpRequest,
  clock?: OAuthV1Clock,
): string {
  const oauth = createOAuth(signer.consumer, clock);
  const protocolParams = signer.protocolParams ?? {};

  const authorization = oauth.authorize(
    {
      url: request.uri,
      method: request.method,
      data: { ...formParameters(request), ...protocolParams },
    },
    signer.token ? { key: signer.token.value, secret: signer.token.secret } : undefined,
  );

  return oauth.toHeader({ ...authorization, ...protocolParams }).Authorization;
}
