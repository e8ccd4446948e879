const HEX_PATTERN = /^[0-9a-fA-F]*$/;

export function stripHexPrefix(value: string): string {
  return value.startsWith('0x') || value.startsWith('0X') ? value.slice(2) : value;
}

export function isHexString(value: string): boolean {
  const normalized = stripHexPrefix(value);
  return normalized.length % 2 === 0 && normalized.length > 0 && HEX_PATTERN.test(normalized);
}

export function hexToBytes(value: string) {
  const normalized = stripHexPrefix(value);
  if (normalized.length % 2 !== 0) {
    throw new Error('Hex string must contain an even number of characters');
  }
  if (!HEX_PATTERN.test(normalized)) {
    throw new Error('Hex string contains invalid characters');
  }
  const bytes = new Uint8Array(normalized.length / 2);
  for (let i = 0; i < normalized.length; i += 2) {
    bytes[i / 2] = parseInt(normalized.slice(i, i + 2), 16);
  }
  return bytes;
}

export function bytesToHex(bytes: Uint8Array): string {
  const hex: string[] = new Array(bytes.length);
  for (let i = 0; i < bytes.length; i++) {
    hex[i] = bytes[i].toString(16).padStart(2, '0');
  }
  return hex.join('');
}

export function utf8ToBytes(value: string) {
  return new TextEncoder().encode(value);
}

export function copyBytes(source: Uint8Array) {
  const bytes = new Uint8Array(source.length);
  bytes.set(source);
  return bytes;
}

export function concatBytes(...parts: Uint8Array[]) {
  const length = parts.reduce((total, part) => total + part.length, 0);
  const output = new Uint8Array(length);
  let offset = 0;
  for (const part of parts) {
    output.set(part, offset);
    offset += part.length;
  }
  return output;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}
