import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { classifyOutcome, classifyResponse } from '../../http/response-classifier.js';
import { decoders, jsonDecoder, plainTextDecoder, plainTextErrorDecoder } from '../../http/decoders.js';
import { ResponseErrorKind } from '../../http/response-error.js';
import { err } from '../../result.js';
import { TransportError } from '../../transports/errors/transport-error.js';
import { logError } from '../../logger.js';
import { expectErr, expectOk, rawResponse } from './test-utils.js';

vi.mock('../../logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../logger.js')>();
  return {
    ...actual,
    logEvent: vi.fn(),
    logError: vi.fn(),
  };
});

const UserSchema = z.object({ id: z.number(), name: z.string() });
const userDecoders = decoders({ success: jsonDecoder(UserSchema) });

describe('classifyResponse', () => {
  beforeEach(() => {
    vi.mocked(logError).mockClear();
  });

  describe('content type checks', () => {
    it('should reject a 200 without Content-Type', () => {
      const error = expectErr(classifyResponse(rawResponse(200, '{"id":1}'), userDecoders));

      expect(error.kind).toBe(ResponseErrorKind.UNSUPPORTED_MEDIA_TYPE);
      expect(error.message).toBe('Content-Type not provided');
      expect(error.status).toBe(200);
    });

    it('should report an unexpected success media type with the body', () => {
      const error = expectErr(
        classifyResponse(rawResponse(200, 'hello', 'text/plain'), userDecoders),
      );

      expect(error.kind).toBe(ResponseErrorKind.UNSUPPORTED_MEDIA_TYPE);
      expect(error.message).toBe('hello');
      expect(error.status).toBe(200);
    });

    it('should check error bodies against the error decoder', () => {
      const error = expectErr(
        classifyResponse(rawResponse(400, '<error/>', 'application/xml'), userDecoders),
      );

      expect(error.kind).toBe(ResponseErrorKind.UNSUPPORTED_MEDIA_TYPE);
      expect(error.message).toBe('<error/>');
      expect(error.status).toBe(400);
    });

    it('should truncate long bodies to 500 characters', () => {
      const body = 'x'.repeat(600);
      const error = expectErr(classifyResponse(rawResponse(200, body, 'text/html'), userDecoders));

      expect(error.message).toBe('x'.repeat(500));
    });

    it('should find a Content-Type header in any letter case', () => {
      const response = expectOk(
        classifyResponse(
          { status: 200, headers: { 'Content-Type': 'application/json' }, body: '{"id":1,"name":"a"}' },
          userDecoders,
        ),
      );

      expect(response.entity).toEqual({ id: 1, name: 'a' });
    });

    it('should accept media type parameters', () => {
      const response = expectOk(
        classifyResponse(
          rawResponse(200, '{"id":1,"name":"ada"}', 'application/json; charset=utf-8'),
          userDecoders,
        ),
      );

      expect(response.entity).toEqual({ id: 1, name: 'ada' });
    });
  });

  describe('successful responses', () => {
    it('should decode the entity and keep status and headers', () => {
      const response = expectOk(
        classifyResponse(rawResponse(201, '{"id":7,"name":"bo"}', 'application/json'), userDecoders),
      );

      expect(response).toEqual({
        status: 201,
        headers: { 'content-type': 'application/json' },
        entity: { id: 7, name: 'bo' },
      });
    });

    it('should hide decoding problems behind a generic 500', () => {
      const error = expectErr(
        classifyResponse(rawResponse(200, '{"id":"seven"}', 'application/json'), userDecoders),
      );

      expect(error.kind).toBe(ResponseErrorKind.DECODING_FAILURE);
      expect(error.status).toBe(500);
      expect(error.message).toBe(
        'There was a problem decoding or parsing this response, please check the error logs',
      );
      expect(logError).toHaveBeenCalledTimes(1);
    });

    it('should treat an empty JSON body as a decoding failure', () => {
      const error = expectErr(classifyResponse(rawResponse(200, '', 'application/json'), userDecoders));

      expect(error.kind).toBe(ResponseErrorKind.DECODING_FAILURE);
    });

    it('should decode an empty plain text body as an empty string', () => {
      const response = expectOk(
        classifyResponse(rawResponse(200, '', 'text/plain'), decoders({ success: plainTextDecoder() })),
      );

      expect(response.entity).toBe('');
    });
  });

  describe('error responses', () => {
    it('should report an empty 404 body', () => {
      const error = expectErr(classifyResponse(rawResponse(404, '', 'application/json'), userDecoders));

      expect(error.kind).toBe(ResponseErrorKind.EMPTY_RESPONSE);
      expect(error.message).toBe('Response was empty. Please check request logs');
      expect(error.status).toBe(404);
    });

    it('should treat a whitespace body as empty', () => {
      const error = expectErr(classifyResponse(rawResponse(503, ' \n ', 'text/plain'), userDecoders));

      expect(error.kind).toBe(ResponseErrorKind.EMPTY_RESPONSE);
      expect(error.status).toBe(503);
    });

    it('should pretty-print JSON error bodies', () => {
      const error = expectErr(
        classifyResponse(
          rawResponse(404, '{"error":"not_found","code":404}', 'application/json'),
          userDecoders,
        ),
      );

      expect(error.kind).toBe(ResponseErrorKind.ERROR_RESPONSE);
      expect(error.status).toBe(404);
      expect(error.message).toBe('{\n  "error": "not_found",\n  "code": 404\n}');
    });

    it('should return text error bodies unchanged', () => {
      const error = expectErr(
        classifyResponse(rawResponse(401, 'invalid signature', 'text/plain'), userDecoders),
      );

      expect(error.message).toBe('invalid signature');
      expect(error.status).toBe(401);
    });

    it('should fall back to the raw body when the error decoder fails', () => {
      const error = expectErr(classifyResponse(rawResponse(500, '{oops', 'application/json'), userDecoders));

      expect(error.kind).toBe(ResponseErrorKind.ERROR_RESPONSE);
      expect(error.message).toBe('{oops');
    });

    it('should honour a custom error decoder media range', () => {
      const textOnly = decoders({ success: jsonDecoder(UserSchema), error: plainTextErrorDecoder });
      const error = expectErr(
        classifyResponse(rawResponse(400, '{"error":"x"}', 'application/json'), textOnly),
      );

      expect(error.kind).toBe(ResponseErrorKind.UNSUPPORTED_MEDIA_TYPE);
    });
  });

  it('should classify the same response identically twice', () => {
    const response = rawResponse(404, '{"error":"gone"}', 'application/json');

    const first = classifyResponse(response, userDecoders);
    const second = classifyResponse(response, userDecoders);

    expect(second).toEqual(first);
  });
});

describe('classifyOutcome', () => {
  it('should map a transport failure to a generic 500', () => {
    const error = expectErr(
      classifyOutcome(err(TransportError.connectionFailed('ECONNREFUSED')), userDecoders),
    );

    expect(error.kind).toBe(ResponseErrorKind.TRANSPORT_FAILURE);
    expect(error.status).toBe(500);
    expect(error.message).toBe('There was a problem with the response. Please check error logs');
    expect(logError).toHaveBeenCalled();
  });
});
