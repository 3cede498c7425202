// ============================================================================
// Provider Directory — NPI Utilities
// ============================================================================

import { NPI_BODY_DIGITS, NPI_LUHN_PREFIX } from '../constants/provider.constants.js';

/**
 * Luhn sum over a digit string where the rightmost digit is a check digit
 * position (not doubled).
 */
function luhnSum(digits: string): number {
  let sum = 0;
  for (let i = digits.length - 1; i >= 0; i--) {
    let digit = Number(digits.charAt(i));
    const positionFromRight = digits.length - 1 - i;

    if (positionFromRight % 2 === 1) {
      digit *= 2;
      if (digit > 9) {
        digit -= 9;
      }
    }

    sum += digit;
  }
  return sum;
}

/**
 * Computes the NPI check digit for a 9-digit body.
 *
 * The Luhn algorithm runs over "80840" + body, the prefix the NPI standard
 * reserves for US health identifiers.
 */
export function computeNpiCheckDigit(body: string): number {
  if (!new RegExp(`^\\d{${NPI_BODY_DIGITS}}$`).test(body)) {
    throw new RangeError(`NPI body must be exactly ${NPI_BODY_DIGITS} digits`);
  }
  // A trailing 0 placeholder keeps the body digits at their doubled positions.
  const sum = luhnSum(`${NPI_LUHN_PREFIX}${body}0`);
  return (10 - (sum % 10)) % 10;
}

/** Builds a full 10-digit NPI from a 9-digit body. */
export function buildNpi(body: string): string {
  return `${body}${computeNpiCheckDigit(body)}`;
}

/**
 * Validates a 10-digit NPI.
 *
 * @returns Validation result with optional error message
 */
export function validateNpi(npi: string): {
  valid: boolean;
  error?: string;
} {
  if (!/^\d{10}$/.test(npi)) {
    return { valid: false, error: 'NPI must be exactly 10 digits' };
  }

  if (luhnSum(`${NPI_LUHN_PREFIX}${npi}`) % 10 !== 0) {
    return { valid: false, error: 'NPI failed Luhn check digit validation' };
  }

  return { valid: true };
}
