import type { z } from 'zod';
import { err, ok, type Result } from '../result.js';
import { DecodeError } from './decode-error.js';
import { isJsonMediaType, MediaTypes, mediaTypeMatches, type MediaType } from './media-type.js';

/**
 * Turns a response body of one of `mediaTypes` into a `T`.
 */
export interface ResponseDecoder<T> {
  readonly mediaTypes: readonly string[];
  decode(body: string, contentType: MediaType): Result<T, DecodeError>;
}

/**
 * Success decoder plus the decoder producing the message of a non-2xx response.
 */
export interface Decoders<T> {
  readonly success: ResponseDecoder<T>;
  readonly error: ResponseDecoder<string>;
}

export function accepts(decoder: ResponseDecoder<unknown>, contentType: MediaType): boolean {
  return decoder.mediaTypes.some((range) => mediaTypeMatches(range, contentType));
}

function parseJson(body: string): Result<unknown, DecodeError> {
  try {
    return ok(JSON.parse(body));
  } catch (error) {
    return err(new DecodeError('Malformed JSON body', error));
  }
}

function validate<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
): Result<z.output<S>, DecodeError> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return ok(parsed.data);
  }
  return err(new DecodeError(`Schema validation failed: ${parsed.error.message}`, parsed.error));
}

/**
 * JSON body validated against a zod schema.
 */
export function jsonDecoder<S extends z.ZodTypeAny>(schema: S): ResponseDecoder<z.output<S>> {
  return {
    mediaTypes: [MediaTypes.JSON, 'application/*+json'],
    decode(body) {
      const parsed = parseJson(body);
      return parsed.ok ? validate(schema, parsed.value) : parsed;
    },
  };
}

/**
 * `application/x-www-form-urlencoded` body, validated against a zod object
 * schema. Repeated keys keep their last value.
 */
export function formDecoder<S extends z.ZodTypeAny>(schema: S): ResponseDecoder<z.output<S>> {
  return {
    // Several OAuth 1.0a servers answer token requests as text/plain.
    mediaTypes: [MediaTypes.FORM, MediaTypes.TEXT],
    decode(body) {
      return validate(schema, Object.fromEntries(new URLSearchParams(body)));
    },
  };
}

/**
 * Plain-text body, optionally mapped to another value. A throwing `map`
 * becomes a decode failure.
 */
export function plainTextDecoder(): ResponseDecoder<string>;
export function plainTextDecoder<T>(map: (text: string) => T): ResponseDecoder<T>;
export function plainTextDecoder<T>(map?: (text: string) => T): ResponseDecoder<T | string> {
  return {
    mediaTypes: ['text/*'],
    decode(body) {
      if (!map) return ok(body);
      try {
        return ok(map(body));
      } catch (error) {
        return err(new DecodeError('Plain text mapping failed', error));
      }
    },
  };
}

/**
 * JSON error bodies, re-rendered with two-space indentation.
 */
export const jsonErrorDecoder: ResponseDecoder<string> = {
  mediaTypes: [MediaTypes.JSON, 'application/*+json'],
  decode(body) {
    const parsed = parseJson(body);
    return parsed.ok ? ok(JSON.stringify(parsed.value, null, 2)) : parsed;
  },
};

export const plainTextErrorDecoder: ResponseDecoder<string> = {
  mediaTypes: ['text/*'],
  decode(body) {
    return ok(body);
  },
};

/**
 * JSON or text error bodies.
 */
export const defaultErrorDecoder: ResponseDecoder<string> = {
  mediaTypes: [...jsonErrorDecoder.mediaTypes, ...plainTextErrorDecoder.mediaTypes],
  decode(body, contentType) {
    return isJsonMediaType(contentType)
      ? jsonErrorDecoder.decode(body, contentType)
      : plainTextErrorDecoder.decode(body, contentType);
  },
};

export interface DecodersInit<T> {
  success: ResponseDecoder<T>;
  error?: ResponseDecoder<string>;
}

/**
 * Pairs a success decoder with an error decoder, {@link defaultErrorDecoder}
 * unless given.
 * @throws {TypeError} when no success decoder is supplied
 */
export function decoders<T>(init: DecodersInit<T>): Decoders<T> {
  // Reachable from untyped callers.
  if (typeof init?.success?.decode !== 'function') {
    throw new TypeError('A success decoder is required');
  }
  return { success: init.success, error: init.error ?? defaultErrorDecoder };
}

/**
 * `Accept` header value covering every media type the decoders take.
 */
export function acceptHeader(pair: Decoders<unknown>): string {
  return [...new Set([...pair.success.mediaTypes, ...pair.error.mediaTypes])].join(', ');
}
