import { sha256 } from '@noble/hashes/sha256';
import { base64, base64url } from '@scure/base';
import { bytesToHex, hexToBytes } from '@seedvault/helpers';

import type { TonWorkchain } from '../config';
import { InvalidAddressFormatError } from '../errors';
import { ed25519PublicKey, parsePrivateKey } from '../keys';

const BOUNCEABLE_TAG = 0x11;
const NON_BOUNCEABLE_TAG = 0x51;
const TESTNET_FLAG = 0x80;
const RAW_PATTERN = /^(0|-1):([0-9a-fA-F]{64})$/;

export interface TonFriendlyOptions {
  /** default true */
  bounceable?: boolean;
  /** default false */
  testnet?: boolean;
  /** default true */
  urlSafe?: boolean;
}

export interface TonAddressParts {
  workchain: TonWorkchain;
  hash: Uint8Array;
}

export interface DecodedTonFriendlyAddress extends TonAddressParts {
  bounceable: boolean;
  testnet: boolean;
  /** Raw `workchain:hex` form */
  raw: string;
}

/** Raw `workchain:hex(sha256(publicKey))` form. */
export function tonAddressFromPublicKey(publicKey: Uint8Array, workchain: TonWorkchain = 0): string {
  if (publicKey.length !== 32) {
    throw new InvalidAddressFormatError('Expected a 32-byte Ed25519 public key');
  }
  return `${workchain}:${bytesToHex(sha256(publicKey))}`;
}

export function tonAddressFromPrivateKey(privateKeyHex: string, workchain: TonWorkchain = 0): string {
  const key = parsePrivateKey(privateKeyHex, 'ed25519');
  try {
    return tonAddressFromPublicKey(ed25519PublicKey(key), workchain);
  } finally {
    key.fill(0);
  }
}

export function parseRawTonAddress(raw: string): TonAddressParts {
  const match = RAW_PATTERN.exec(raw);
  if (!match) {
    throw new InvalidAddressFormatError('TON raw address must be "<workchain>:<64 hex>"', { address: raw });
  }
  return { workchain: match[1] === '-1' ? -1 : 0, hash: hexToBytes(match[2]) };
}

/** CRC-16/XMODEM (poly 0x1021, init 0). */
export function crc16(data: Uint8Array): number {
  let crc = 0;
  for (const byte of data) {
    crc ^= byte << 8;
    for (let bit = 0; bit < 8; bit++) {
      crc = crc & 0x8000 ? ((crc << 1) ^ 0x1021) & 0xffff : (crc << 1) & 0xffff;
    }
  }
  return crc;
}

export function encodeTonFriendlyAddress(raw: string, options: TonFriendlyOptions = {}): string {
  const { workchain, hash } = parseRawTonAddress(raw);
  const bounceable = options.bounceable ?? true;
  const testnet = options.testnet ?? false;

  const bytes = new Uint8Array(36);
  bytes[0] = (bounceable ? BOUNCEABLE_TAG : NON_BOUNCEABLE_TAG) | (testnet ? TESTNET_FLAG : 0);
  bytes[1] = workchain & 0xff;
  bytes.set(hash, 2);
  const checksum = crc16(bytes.subarray(0, 34));
  bytes[34] = checksum >> 8;
  bytes[35] = checksum & 0xff;

  return (options.urlSafe ?? true) ? base64url.encode(bytes) : base64.encode(bytes);
}

export function decodeTonFriendlyAddress(address: string): DecodedTonFriendlyAddress {
  if (address.length !== 48) {
    throw new InvalidAddressFormatError('TON friendly address must be 48 characters', { address });
  }

  let bytes: Uint8Array;
  try {
    bytes = /[-_]/.test(address) ? base64url.decode(address) : base64.decode(address);
  } catch (error) {
    throw new InvalidAddressFormatError('TON friendly address is not valid Base64', {
      address,
      reason: String(error),
    });
  }

  const checksum = crc16(bytes.subarray(0, 34));
  if (bytes[34] !== checksum >> 8 || bytes[35] !== (checksum & 0xff)) {
    throw new InvalidAddressFormatError('TON friendly address has an invalid checksum', { address });
  }

  const tag = bytes[0] & ~TESTNET_FLAG;
  if (tag !== BOUNCEABLE_TAG && tag !== NON_BOUNCEABLE_TAG) {
    throw new InvalidAddressFormatError('TON friendly address has an unknown tag', { address, tag: bytes[0] });
  }

  let workchain: TonWorkchain;
  if (bytes[1] === 0x00) {
    workchain = 0;
  } else if (bytes[1] === 0xff) {
    workchain = -1;
  } else {
    throw new InvalidAddressFormatError('TON friendly address has an unsupported workchain', {
      address,
      workchain: bytes[1],
    });
  }

  const hash = bytes.slice(2, 34);
  return {
    workchain,
    hash,
    bounceable: tag === BOUNCEABLE_TAG,
    testnet: (bytes[0] & TESTNET_FLAG) !== 0,
    raw: `${workchain}:${bytesToHex(hash)}`,
  };
}

/** Accepts the raw form or a user-friendly form with a valid checksum. */
export function validateTonAddress(address: string): void {
  if (address.includes(':')) {
    parseRawTonAddress(address);
    return;
  }
  decodeTonFriendlyAddress(address);
}
