import { bech32, bech32m, createBase58check } from '@scure/base';
import { ripemd160 } from '@noble/hashes/ripemd160';
import { sha256 } from '@noble/hashes/sha256';

import type { BitcoinNetwork } from '../config';
import { InvalidAddressFormatError } from '../errors';
import { parsePrivateKey, secp256k1PublicKey } from '../keys';

const base58check = createBase58check(sha256);

export const BECH32_HRP: Record<BitcoinNetwork, string> = {
  mainnet: 'bc',
  testnet: 'tb',
};

const BASE58_VERSIONS: Record<BitcoinNetwork, { p2pkh: number; p2sh: number }> = {
  mainnet: { p2pkh: 0x00, p2sh: 0x05 },
  testnet: { p2pkh: 0x6f, p2sh: 0xc4 },
};

const BECH32_LIMIT = 90;

export interface SegwitAddress {
  hrp: string;
  version: number;
  program: Uint8Array;
}

export function hash160(data: Uint8Array): Uint8Array {
  return ripemd160(sha256(data));
}

/** Bech32 for witness version 0, Bech32m for versions 1 through 16. */
export function encodeSegwitAddress(hrp: string, version: number, program: Uint8Array): string {
  assertWitnessProgram(version, program);
  const words = [version, ...bech32.toWords(program)];
  return version === 0 ? bech32.encode(hrp, words, BECH32_LIMIT) : bech32m.encode(hrp, words, BECH32_LIMIT);
}

export function decodeSegwitAddress(address: string, expectedHrp?: string): SegwitAddress {
  const decoded = bech32.decodeUnsafe(address, BECH32_LIMIT) || bech32m.decodeUnsafe(address, BECH32_LIMIT);
  if (!decoded || decoded.words.length === 0) {
    throw new InvalidAddressFormatError('Not a valid Bech32 address', { address });
  }

  const hrp = decoded.prefix;
  if (expectedHrp !== undefined && hrp !== expectedHrp) {
    throw new InvalidAddressFormatError(`Expected address prefix "${expectedHrp}"`, { address, hrp });
  }

  const version = decoded.words[0];
  const program = bech32.fromWordsUnsafe(decoded.words.slice(1));
  if (!program) {
    throw new InvalidAddressFormatError('Witness program has invalid padding', { address });
  }
  assertWitnessProgram(version, program);

  // v0 must be Bech32 and v1+ must be Bech32m.
  const expected = encodeSegwitAddress(hrp, version, program);
  if (expected !== address.toLowerCase()) {
    throw new InvalidAddressFormatError('Witness version does not match the checksum variant', { address });
  }

  return { hrp, version, program };
}

function assertWitnessProgram(version: number, program: Uint8Array): void {
  if (!Number.isInteger(version) || version < 0 || version > 16) {
    throw new InvalidAddressFormatError('Witness version must be between 0 and 16', { version });
  }
  if (program.length < 2 || program.length > 40) {
    throw new InvalidAddressFormatError('Witness program must be 2 to 40 bytes', { length: program.length });
  }
  if (version === 0 && program.length !== 20 && program.length !== 32) {
    throw new InvalidAddressFormatError('Version 0 witness program must be 20 or 32 bytes', {
      length: program.length,
    });
  }
}

/** Native segwit P2WPKH address for a compressed public key. */
export function btcAddressFromPublicKey(compressedPublicKey: Uint8Array, network: BitcoinNetwork = 'mainnet'): string {
  if (compressedPublicKey.length !== 33) {
    throw new InvalidAddressFormatError('Expected a 33-byte compressed public key');
  }
  return encodeSegwitAddress(BECH32_HRP[network], 0, hash160(compressedPublicKey));
}

export function btcAddressFromPrivateKey(privateKeyHex: string, network: BitcoinNetwork = 'mainnet'): string {
  const key = parsePrivateKey(privateKeyHex, 'secp256k1');
  try {
    return btcAddressFromPublicKey(secp256k1PublicKey(key, true), network);
  } finally {
    key.fill(0);
  }
}

/**
 * Accepts segwit addresses for the network's HRP and Base58Check P2PKH or
 * P2SH addresses with the network's version byte.
 */
export function validateBtcAddress(address: string, network: BitcoinNetwork = 'mainnet'): void {
  const hrp = BECH32_HRP[network];
  if (address.toLowerCase().startsWith(`${hrp}1`)) {
    decodeSegwitAddress(address, hrp);
    return;
  }

  let payload: Uint8Array;
  try {
    payload = base58check.decode(address);
  } catch (error) {
    throw new InvalidAddressFormatError('Not a valid Bitcoin address', { address, reason: String(error) });
  }

  const versions = BASE58_VERSIONS[network];
  if (payload.length !== 21 || (payload[0] !== versions.p2pkh && payload[0] !== versions.p2sh)) {
    throw new InvalidAddressFormatError(`Not a ${network} P2PKH or P2SH address`, { address });
  }
}
