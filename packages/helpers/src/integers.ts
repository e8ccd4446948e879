const DECIMAL_PATTERN = /^[0-9]+$/;

/**
 * Parse an unsigned decimal string into a bigint.
 * Returns undefined for anything other than plain ASCII digits or for values
 * that do not fit in `maxBits` bits.
 */
export function parseUnsignedDecimal(value: string, maxBits: number): bigint | undefined {
  if (!DECIMAL_PATTERN.test(value)) {
    return undefined;
  }
  const parsed = BigInt(value);
  return parsed < 1n << BigInt(maxBits) ? parsed : undefined;
}

export function fitsUnsigned(value: bigint, maxBits: number): boolean {
  return value >= 0n && value < 1n << BigInt(maxBits);
}

export function bytesToBigint(bytes: Uint8Array): bigint {
  let result = 0n;
  for (let i = 0; i < bytes.length; i++) {
    result = (result << 8n) | BigInt(bytes[i]);
  }
  return result;
}

/** Minimal big-endian encoding; zero encodes as an empty array. */
export function bigintToBytes(value: bigint) {
  if (value < 0n) {
    throw new Error('Cannot encode a negative integer');
  }
  let hex = value === 0n ? '' : value.toString(16);
  if (hex.length % 2 !== 0) {
    hex = `0${hex}`;
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

export function bigintToFixedBytes(value: bigint, length: number) {
  const minimal = bigintToBytes(value);
  if (minimal.length > length) {
    throw new Error(`Integer does not fit in ${length} bytes`);
  }
  const bytes = new Uint8Array(length);
  bytes.set(minimal, length - minimal.length);
  return bytes;
}

export function writeUint32BE(target: Uint8Array, offset: number, value: number): void {
  new DataView(target.buffer, target.byteOffset, target.byteLength).setUint32(offset, value, false);
}
