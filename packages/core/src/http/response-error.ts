/**
 * Categories of a request that did not yield a decoded success entity
 */
export enum ResponseErrorKind {
  UNSUPPORTED_MEDIA_TYPE = 'unsupported_media_type',
  DECODING_FAILURE = 'decoding_failure',
  EMPTY_RESPONSE = 'empty_response',
  ERROR_RESPONSE = 'error_response',
  TRANSPORT_FAILURE = 'transport_failure',
}

export const RESPONSE_ERROR_MESSAGES = {
  CONTENT_TYPE_MISSING: 'Content-Type not provided',
  DECODING_FAILURE:
    'There was a problem decoding or parsing this response, please check the error logs',
  EMPTY_RESPONSE: 'Response was empty. Please check request logs',
  TRANSPORT_FAILURE: 'There was a problem with the response. Please check error logs',
} as const;

/** Longest body excerpt carried in an error message */
export const MAX_BODY_EXCERPT = 500;

export function excerpt(body: string): string {
  return body.length > MAX_BODY_EXCERPT ? body.slice(0, MAX_BODY_EXCERPT) : body;
}

/**
 * Classified failure of a request. Returned inside a `Result`, never thrown
 * by the pipeline.
 */
export class ResponseError extends Error {
  public readonly kind: ResponseErrorKind;
  public readonly status: number;
  public readonly headers?: Readonly<Record<string, string>>;

  public constructor(
    kind: ResponseErrorKind,
    message: string,
    status: number,
    headers?: Readonly<Record<string, string>>,
  ) {
    super(message);
    this.name = 'ResponseError';
    this.kind = kind;
    this.status = status;
    this.headers = headers;

    Object.setPrototypeOf(this, ResponseError.prototype);
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      status: this.status,
      message: this.message,
    };
  }

  public static contentTypeMissing(
    status: number,
    headers?: Readonly<Record<string, string>>,
  ): ResponseError {
    return new ResponseError(
      ResponseErrorKind.UNSUPPORTED_MEDIA_TYPE,
      RESPONSE_ERROR_MESSAGES.CONTENT_TYPE_MISSING,
      status,
      headers,
    );
  }

  public static unsupportedMediaType(
    body: string,
    status: number,
    headers?: Readonly<Record<string, string>>,
  ): ResponseError {
    return new ResponseError(
      ResponseErrorKind.UNSUPPORTED_MEDIA_TYPE,
      excerpt(body),
      status,
      headers,
    );
  }

  public static decodingFailure(headers?: Readonly<Record<string, string>>): ResponseError {
    return new ResponseError(
      ResponseErrorKind.DECODING_FAILURE,
      RESPONSE_ERROR_MESSAGES.DECODING_FAILURE,
      500,
      headers,
    );
  }

  public static emptyResponse(
    status: number,
    headers?: Readonly<Record<string, string>>,
  ): ResponseError {
    return new ResponseError(
      ResponseErrorKind.EMPTY_RESPONSE,
      RESPONSE_ERROR_MESSAGES.EMPTY_RESPONSE,
      status,
      headers,
    );
  }

  public static errorResponse(
    message: string,
    status: number,
    headers?: Readonly<Record<string, string>>,
  ): ResponseError {
    return new ResponseError(ResponseErrorKind.ERROR_RESPONSE, message, status, headers);
  }

  public static transportFailure(): ResponseError {
    return new ResponseError(
      ResponseErrorKind.TRANSPORT_FAILURE,
      RESPONSE_ERROR_MESSAGES.TRANSPORT_FAILURE,
      500,
    );
  }
}
