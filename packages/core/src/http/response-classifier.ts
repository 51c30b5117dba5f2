import type { RawResponse, TypedResponse } from '@authwire/models';
import { logError } from '../logger.js';
import { err, ok, type Result } from '../result.js';
import type { TransportError } from '../transports/errors/transport-error.js';
import { accepts, type Decoders } from './decoders.js';
import { getHeader } from './headers.js';
import { parseMediaType } from './media-type.js';
import { excerpt, ResponseError } from './response-error.js';

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Turns a raw response into a typed entity or a {@link ResponseError}.
 *
 * Checks run in this order:
 * 1. a `Content-Type` header, in any letter case, must be present;
 * 2. it must be accepted by the success decoder (2xx) or the error decoder;
 * 3. a 2xx body is decoded, and a failure is logged and reported as
 *    `decoding_failure` with status 500;
 * 4. a non-2xx body is `empty_response` when blank, otherwise the error
 *    decoder's rendering (or the raw excerpt) as `error_response`.
 */
export function classifyResponse<T>(
  response: RawResponse,
  decoders: Decoders<T>,
): Result<TypedResponse<T>, ResponseError> {
  const { status, headers, body } = response;

  const header = getHeader(headers, 'content-type');
  const contentType = header === undefined ? undefined : parseMediaType(header);
  if (header === undefined || header.trim() === '') {
    return err(ResponseError.contentTypeMissing(status, headers));
  }

  const successful = isSuccessStatus(status);
  const decoder = successful ? decoders.success : decoders.error;
  if (!contentType || !accepts(decoder, contentType)) {
    return err(ResponseError.unsupportedMediaType(body, status, headers));
  }

  if (successful) {
    const decoded = decoders.success.decode(body, contentType);
    if (!decoded.ok) {
      logError('response:decode', decoded.error, { status, contentType: header });
      return err(ResponseError.decodingFailure(headers));
    }
    return ok({ status, headers, entity: decoded.value });
  }

  if (body.trim() === '') {
    return err(ResponseError.emptyResponse(status, headers));
  }

  const message = decoders.error.decode(body, contentType);
  return err(ResponseError.errorResponse(message.ok ? message.value : excerpt(body), status, headers));
}

/**
 * {@link classifyResponse} for a transport outcome; a failed send becomes
 * `transport_failure` and the cause is logged.
 */
export function classifyOutcome<T>(
  outcome: Result<RawResponse, TransportError>,
  decoders: Decoders<T>,
): Result<TypedResponse<T>, ResponseError> {
  if (!outcome.ok) {
    logError('transport:send', outcome.error, { code: outcome.error.code });
    return err(ResponseError.transportFailure());
  }
  return classifyResponse(outcome.value, decoders);
}
