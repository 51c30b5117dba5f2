/**
 * Ways a request can fail before any HTTP response is received
 */
export enum TransportErrorCode {
  CONNECTION_FAILED = 'connection_failed',
  REQUEST_TIMEOUT = 'request_timeout',
  REQUEST_CANCELLED = 'request_cancelled',
  INVALID_URL = 'invalid_url',
  UNKNOWN_ERROR = 'unknown_error',
}

/**
 * Failure to obtain a response from the server.
 * `isRetryable` is advisory; nothing in this library retries.
 */
export class TransportError extends Error {
  public readonly code: TransportErrorCode;
  public readonly isRetryable: boolean;
  public readonly cause?: Error;

  public constructor(
    message: string,
    code: TransportErrorCode = TransportErrorCode.UNKNOWN_ERROR,
    isRetryable: boolean = false,
    cause?: Error,
  ) {
    super(message);
    this.name = 'TransportError';
    this.code = code;
    this.isRetryable = isRetryable;
    this.cause = cause;

    Object.setPrototypeOf(this, TransportError.prototype);
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      isRetryable: this.isRetryable,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  public static connectionFailed(m: string, c?: Error): TransportError {
    return new TransportError(
      `Connection failed: ${m}`,
      TransportErrorCode.CONNECTION_FAILED,
      true,
      c,
    );
  }

  public static requestTimeout(t: number, c?: Error): TransportError {
    return new TransportError(
      `Request timeout after ${t}ms`,
      TransportErrorCode.REQUEST_TIMEOUT,
      true,
      c,
    );
  }

  public static requestCancelled(c?: Error): TransportError {
    return new TransportError(
      'Request was cancelled',
      TransportErrorCode.REQUEST_CANCELLED,
      false,
      c,
    );
  }

  public static invalidUrl(u: string, c?: Error): TransportError {
    return new TransportError(
      `Invalid URL: ${u}`,
      TransportErrorCode.INVALID_URL,
      false,
      c,
    );
  }

  /**
   * Wraps an arbitrary thrown value, keeping it as `cause` when it is an Error.
   */
  public static from(error: unknown): TransportError {
    if (error instanceof TransportError) return error;
    if (error instanceof Error) {
      return new TransportError(error.message, TransportErrorCode.UNKNOWN_ERROR, false, error);
    }
    return new TransportError(String(error));
  }
}
