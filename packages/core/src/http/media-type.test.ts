import { describe, it, expect } from 'vitest';
import { formatMediaType, isJsonMediaType, mediaTypeMatches, parseMediaType } from './media-type.js';

describe('parseMediaType', () => {
  it('lower-cases type and parameter names', () => {
    expect(parseMediaType('Application/JSON; Charset="UTF-8"')).toEqual({
      type: 'application',
      subtype: 'json',
      parameters: { charset: 'UTF-8' },
    });
  });

  it('rejects values without a subtype', () => {
    expect(parseMediaType('json')).toBeUndefined();
    expect(parseMediaType('')).toBeUndefined();
  });
});

describe('formatMediaType', () => {
  it('renders the essence without parameters', () => {
    expect(formatMediaType({ type: 'text', subtype: 'plain', parameters: { charset: 'utf-8' } })).toBe(
      'text/plain',
    );
  });
});

describe('mediaTypeMatches', () => {
  const json = { type: 'application', subtype: 'json', parameters: {} };

  it('matches exact, type wildcard and full wildcard ranges', () => {
    expect(mediaTypeMatches('application/json', json)).toBe(true);
    expect(mediaTypeMatches('application/*', json)).toBe(true);
    expect(mediaTypeMatches('*/*', json)).toBe(true);
  });

  it('rejects other types', () => {
    expect(mediaTypeMatches('text/*', json)).toBe(false);
    expect(mediaTypeMatches('application/xml', json)).toBe(false);
  });
});

describe('isJsonMediaType', () => {
  it('recognises structured syntax suffixes', () => {
    const problem = parseMediaType('application/problem+json');
    expect(problem && isJsonMediaType(problem)).toBe(true);
  });
});
