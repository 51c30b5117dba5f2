import type { HttpRequest, RawResponse } from '@authwire/models';
import { logEvent } from '../logger.js';
import { err, ok, type Result } from '../result.js';
import { TransportError } from './errors/transport-error.js';

/**
 * Sends a fully signed request and hands back the raw response.
 *
 * Implementations never throw for network problems: every failure to obtain
 * a response comes back as a {@link TransportError}. Any HTTP status,
 * including 4xx and 5xx, is a successful send.
 */
export interface HttpTransport {
  send(request: HttpRequest, signal?: AbortSignal): Promise<Result<RawResponse, TransportError>>;
}

export interface FetchTransportOptions {
  /** Abort after this many milliseconds. No timeout when omitted. */
  timeoutMs?: number;
  /** Replaces the global `fetch`, mainly for tests. */
  fetch?: typeof fetch;
}

/**
 * {@link HttpTransport} on top of the WHATWG `fetch` built into Node.js.
 */
export class FetchTransport implements HttpTransport {
  private readonly timeoutMs?: number;
  private readonly fetchImpl?: typeof fetch;

  public constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch;
  }

  public async send(
    request: HttpRequest,
    signal?: AbortSignal,
  ): Promise<Result<RawResponse, TransportError>> {
    let url: URL;
    try {
      url = new URL(request.uri);
    } catch (error) {
      return err(TransportError.invalidUrl(request.uri, error instanceof Error ? error : undefined));
    }

    if (signal?.aborted) {
      return err(TransportError.requestCancelled());
    }

    const controller = new AbortController();
    let timedOut = false;
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const timer =
      this.timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            timedOut = true;
            controller.abort();
          }, this.timeoutMs);

    // Resolved per call so a fetch stubbed after construction is picked up.
    const doFetch = this.fetchImpl ?? fetch;

    try {
      const response = await doFetch(url, {
        method: request.method,
        headers: { ...request.headers },
        body: request.body,
        signal: controller.signal,
      });
      const body = await response.text();

      const headers: Record<string, string> = {};
      response.headers.forEach((value, name) => {
        headers[name.toLowerCase()] = value;
      });

      logEvent('debug', 'transport:response-received', {
        method: request.method,
        uri: `${url.origin}${url.pathname}`,
        status: response.status,
      });

      return ok({ status: response.status, headers, body });
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      if (timedOut && this.timeoutMs !== undefined) {
        return err(TransportError.requestTimeout(this.timeoutMs, cause));
      }
      if (controller.signal.aborted) {
        return err(TransportError.requestCancelled(cause));
      }
      return err(TransportError.connectionFailed(cause?.message ?? String(error), cause));
    } finally {
      if (timer !== undefined) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
