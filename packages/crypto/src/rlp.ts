import { bigintToBytes, bytesToBigint, concatBytes } from '@seedvault/helpers';

import { InvalidDataEncodingError } from './errors';

export type RlpItem = Uint8Array | RlpItem[];

const STRING_OFFSET = 0x80;
const LIST_OFFSET = 0xc0;
const SHORT_LIMIT = 55;

export function encodeRlp(item: RlpItem): Uint8Array {
  if (item instanceof Uint8Array) {
    if (item.length === 1 && item[0] < STRING_OFFSET) {
      return item.slice();
    }
    return concatBytes(encodeLength(item.length, STRING_OFFSET), item);
  }

  const payload = concatBytes(...item.map(encodeRlp));
  return concatBytes(encodeLength(payload.length, LIST_OFFSET), payload);
}

function encodeLength(length: number, offset: number): Uint8Array {
  if (length <= SHORT_LIMIT) {
    return Uint8Array.of(offset + length);
  }
  const lengthBytes = bigintToBytes(BigInt(length));
  return concatBytes(Uint8Array.of(offset + SHORT_LIMIT + lengthBytes.length), lengthBytes);
}

/** Canonical integer encoding: minimal big-endian, zero as the empty string. */
export function encodeRlpInteger(value: bigint | number): Uint8Array {
  return bigintToBytes(BigInt(value));
}

export function decodeRlpInteger(bytes: Uint8Array): bigint {
  if (bytes.length > 0 && bytes[0] === 0) {
    throw new InvalidDataEncodingError('RLP integer has leading zero bytes');
  }
  return bytesToBigint(bytes);
}

/**
 * Decode a single RLP item occupying all of `input`. Non-canonical lengths
 * and trailing bytes are rejected.
 */
export function decodeRlp(input: Uint8Array): RlpItem {
  const { item, consumed } = decodeItem(input, 0);
  if (consumed !== input.length) {
    throw new InvalidDataEncodingError('RLP input has trailing bytes', { trailing: input.length - consumed });
  }
  return item;
}

interface Decoded {
  item: RlpItem;
  consumed: number;
}

function decodeItem(input: Uint8Array, start: number): Decoded {
  if (start >= input.length) {
    throw new InvalidDataEncodingError('RLP input is truncated');
  }

  const prefix = input[start];
  if (prefix < STRING_OFFSET) {
    return { item: input.slice(start, start + 1), consumed: 1 };
  }

  const isList = prefix >= LIST_OFFSET;
  const offset = isList ? LIST_OFFSET : STRING_OFFSET;
  const { length, header } = readLength(input, start, prefix - offset);
  const end = start + header + length;
  if (end > input.length) {
    throw new InvalidDataEncodingError('RLP input is truncated');
  }

  if (!isList) {
    const bytes = input.slice(start + header, end);
    if (bytes.length === 1 && bytes[0] < STRING_OFFSET) {
      throw new InvalidDataEncodingError('Single byte below 0x80 must not carry a prefix');
    }
    return { item: bytes, consumed: header + length };
  }

  const items: RlpItem[] = [];
  let position = start + header;
  while (position < end) {
    const child = decodeItem(input.subarray(0, end), position);
    items.push(child.item);
    position += child.consumed;
  }
  return { item: items, consumed: header + length };
}

function readLength(input: Uint8Array, start: number, marker: number): { length: number; header: number } {
  if (marker <= SHORT_LIMIT) {
    return { length: marker, header: 1 };
  }

  const lengthOfLength = marker - SHORT_LIMIT;
  if (start + 1 + lengthOfLength > input.length) {
    throw new InvalidDataEncodingError('RLP input is truncated');
  }
  const lengthBytes = input.subarray(start + 1, start + 1 + lengthOfLength);
  if (lengthBytes[0] === 0) {
    throw new InvalidDataEncodingError('RLP length has leading zero bytes');
  }
  const length = Number(bytesToBigint(lengthBytes));
  if (length <= SHORT_LIMIT) {
    throw new InvalidDataEncodingError('RLP long form used for a short payload');
  }
  if (!Number.isSafeInteger(length)) {
    throw new InvalidDataEncodingError('RLP length is too large');
  }
  return { length, header: 1 + lengthOfLength };
}

export function isRlpList(item: RlpItem): item is RlpItem[] {
  return Array.isArray(item);
}
