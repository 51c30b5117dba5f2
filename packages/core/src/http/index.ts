export * from './media-type.js';
export { DecodeError } from './decode-error.js';
export {
  accepts,
  acceptHeader,
  decoders,
  defaultErrorDecoder,
  formDecoder,
  jsonDecoder,
  jsonErrorDecoder,
  plainTextDecoder,
  plainTextErrorDecoder,
} from './decoders.js';
export type { Decoders, DecodersInit, ResponseDecoder } from './decoders.js';
export { getHeader, mergeHeaders } from './headers.js';
export {
  excerpt,
  MAX_BODY_EXCERPT,
  RESPONSE_ERROR_MESSAGES,
  ResponseError,
  ResponseErrorKind,
} from './response-error.js';
export { classifyOutcome, classifyResponse, isSuccessStatus } from './response-classifier.js';
export { executeRequest, unsigned } from './request-pipeline.js';
export type { ExecuteOptions, RequestContext, RequestSigner } from './request-pipeline.js';
