import { describe, it, expect } from 'vitest';
import { generateRequestId } from './generateRequestId.js';
import { isValidRequestId } from './isValidRequestId.js';

describe('request ids', () => {
  it('should generate ids that validate for the same prefix', () => {
    const id = generateRequestId('req');

    expect(id).toMatch(/^req_\d{13}_[a-f0-9]{8}$/);
    expect(isValidRequestId(id, 'req')).toBe(true);
    expect(isValidRequestId(id)).toBe(false);
  });

  it('should generate unprefixed ids', () => {
    expect(isValidRequestId(generateRequestId())).toBe(true);
    expect(isValidRequestId('1700000000000_xyz')).toBe(false);
  });
});
