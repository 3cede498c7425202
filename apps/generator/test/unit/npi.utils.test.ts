import { describe, it, expect } from 'vitest';
import {
  buildNpi,
  computeNpiCheckDigit,
  validateNpi,
} from '@clinical-synth/shared/utils/npi.utils.js';

describe('computeNpiCheckDigit', () => {
  it('computes the check digit over the 80840 prefix', () => {
    // Body 123456789: doubled digits 9,7,5,3,1 -> 9+5+1+6+2 = 23
    // Undoubled digits 8,6,4,2 -> 20
    // Prefix 80840 contributes 24 -> total 67 -> check digit 3
    expect(computeNpiCheckDigit('123456789')).toBe(3);
  });

  it('rejects a body that is not 9 digits', () => {
    expect(() => computeNpiCheckDigit('12345')).toThrow('NPI body must be exactly 9 digits');
  });

  it('rejects a body with non-digit characters', () => {
    expect(() => computeNpiCheckDigit('12345678A')).toThrow(RangeError);
  });
});

describe('buildNpi', () => {
  it('appends the check digit to the body', () => {
    expect(buildNpi('123456789')).toBe('1234567893');
  });

  it('produces NPIs that validate', () => {
    for (const body of ['100000000', '199999999', '250000017', '299999999']) {
      expect(validateNpi(buildNpi(body)).valid).toBe(true);
    }
  });
});

describe('validateNpi', () => {
  it('accepts a Luhn-valid NPI', () => {
    const result = validateNpi('1234567893');
    expect(result.valid).toBe(true);
    expect(result.error).toBeUndefined();
  });

  it('rejects a wrong check digit', () => {
    const result = validateNpi('1234567890');
    expect(result.valid).toBe(false);
    expect(result.error).toContain('Luhn');
  });

  it('rejects an NPI shorter than 10 digits', () => {
    const result = validateNpi('123456789');
    expect(result.valid).toBe(false);
    expect(result.error).toBe('NPI must be exactly 10 digits');
  });

  it('rejects non-numeric characters', () => {
    const result = validateNpi('12345678AB');
    expect(result.valid).toBe(false);
    expect(result.error).toBe('NPI must be exactly 10 digits');
  });

  it('rejects an empty string', () => {
    expect(validateNpi('').valid).toBe(false);
  });
});
