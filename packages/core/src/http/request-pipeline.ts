import type { HttpRequest, RawResponse, TypedResponse } from '@authwire/models';
import { logEvent } from '../logger.js';
import { err, type Result } from '../result.js';
import type { Task } from '../task/task.js';
import { TransportError } from '../transports/errors/transport-error.js';
import type { HttpTransport } from '../transports/http-transport.js';
import { generateRequestId } from '../utils/request/generateRequestId.js';
import { acceptHeader, type Decoders } from './decoders.js';
import { mergeHeaders } from './headers.js';
import { classifyOutcome } from './response-classifier.js';
import type { ResponseError } from './response-error.js';

/**
 * Applies an authorization strategy to an outgoing request. Must return a new
 * request and leave its input untouched.
 */
export type RequestSigner = (request: HttpRequest) => HttpRequest;

/** Signer for requests that are already signed or need no authorization. */
export const unsigned: RequestSigner = (request) => request;

export interface RequestContext {
  transport: HttpTransport;
  signer: RequestSigner;
  /** Sent with every request unless the request sets the same header */
  defaultHeaders?: Readonly<Record<string, string>>;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

/**
 * Builds the task that signs, sends and classifies one request.
 *
 * Header precedence, lowest first: context defaults, an `Accept` derived from
 * the decoders, the request's own headers. Signing sees the merged headers.
 * Nothing is sent until the task runs, and each run sends once. The task
 * never rejects: a signer or transport that throws becomes a
 * `transport_failure`.
 */
export function executeRequest<T>(
  context: RequestContext,
  request: HttpRequest,
  decoders: Decoders<T>,
  options: ExecuteOptions = {},
): Task<Result<TypedResponse<T>, ResponseError>> {
  return async () => {
    const requestId = generateRequestId('req');
    const prepared: HttpRequest = {
      ...request,
      headers: mergeHeaders(
        context.defaultHeaders,
        { Accept: acceptHeader(decoders) },
        request.headers,
      ),
    };

    let outcome: Result<RawResponse, TransportError>;
    try {
      const signed = context.signer(prepared);

      logEvent('debug', 'request:send', {
        requestId,
        method: signed.method,
        uri: signed.uri,
        headers: Object.keys(signed.headers),
      });

      outcome = await context.transport.send(signed, options.signal);
    } catch (error) {
      // A throwing signer or transport still yields no response.
      outcome = err(TransportError.from(error));
    }

    const result = classifyOutcome(outcome, decoders);

    logEvent(result.ok ? 'debug' : 'warn', 'request:complete', {
      requestId,
      status: result.ok ? result.value.status : result.error.status,
      kind: result.ok ? undefined : result.error.kind,
    });

    return result;
  };
}
