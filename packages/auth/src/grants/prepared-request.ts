import type { HttpRequest } from '@authwire/models';
import type { Decoders } from '@authwire/core';

/**
 * A fully signed request together with the decoders for its response.
 * Only a description: nothing is sent until a client runs it.
 */
export interface PreparedRequest<T> {
  readonly request: HttpRequest;
  readonly decoders: Decoders<T>;
}
