/**
 * HTTP methods the request pipeline can send
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD';

/**
 * A request description, unsigned or signed.
 *
 * Header names keep the casing they were set with; lookups are
 * case-insensitive (see `getHeader` in `@authwire/core`).
 */
export interface HttpRequest {
  method: HttpMethod;
  /** Absolute URI including any query string */
  uri: string;
  headers: Readonly<Record<string, string>>;
  body?: string;
}

/**
 * Response as handed back by the transport, before classification
 */
export interface RawResponse {
  status: number;
  /** Header names are lower-cased */
  headers: Readonly<Record<string, string>>;
  body: string;
}

/**
 * Successfully classified and decoded response
 */
export interface TypedResponse<T> {
  status: number;
  headers: Readonly<Record<string, string>>;
  entity: T;
}
