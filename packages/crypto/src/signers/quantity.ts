import { fitsUnsigned, parseUnsignedDecimal } from '@seedvault/helpers';

import { InvalidAmountFormatError } from '../errors';

/** Unsigned integer given as a safe integer, a bigint, or a decimal string. */
export type Quantity = number | bigint | string;

export function parseQuantity(field: string, value: Quantity, maxBits: number): bigint {
  if (typeof value === 'string') {
    const parsed = parseUnsignedDecimal(value, maxBits);
    if (parsed === undefined) {
      throw new InvalidAmountFormatError(field, `${field} must be an unsigned decimal below 2^${maxBits}`);
    }
    return parsed;
  }

  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new InvalidAmountFormatError(field, `${field} must be a non-negative safe integer`);
    }
    return parseQuantity(field, BigInt(value), maxBits);
  }

  if (!fitsUnsigned(value, maxBits)) {
    throw new InvalidAmountFormatError(field, `${field} must be an unsigned integer below 2^${maxBits}`);
  }
  return value;
}

/**
 * Parse a decimal amount for a signed message and return its canonical form,
 * so `"007"` and `"7"` sign the same bytes.
 */
export function parseCanonicalAmount(field: string, value: string, maxBits: number): string {
  const parsed = parseUnsignedDecimal(value, maxBits);
  if (parsed === undefined) {
    throw new InvalidAmountFormatError(field, `${field} must be an unsigned decimal below 2^${maxBits}`);
  }
  return parsed.toString();
}

export function parseSafeUnsigned(field: string, value: number, maxBits: number): number {
  if (!Number.isSafeInteger(value) || value < 0 || !fitsUnsigned(BigInt(value), maxBits)) {
    throw new InvalidAmountFormatError(field, `${field} must be an unsigned ${maxBits}-bit integer`);
  }
  return value;
}
