import { keccak_256 } from '@noble/hashes/sha3';
import { bytesToHex, utf8ToBytes } from '@seedvault/helpers';

import { InvalidAddressFormatError } from '../errors';
import { parsePrivateKey, secp256k1PublicKey } from '../keys';

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

/** Lowercase `0x` address from a 65-byte uncompressed secp256k1 point. */
export function ethAddressFromPublicKey(uncompressedPublicKey: Uint8Array): string {
  if (uncompressedPublicKey.length !== 65 || uncompressedPublicKey[0] !== 0x04) {
    throw new InvalidAddressFormatError('Expected a 65-byte uncompressed public key');
  }
  const digest = keccak_256(uncompressedPublicKey.subarray(1));
  return `0x${bytesToHex(digest.subarray(12))}`;
}

/** EIP-55 mixed-case checksum encoding. */
export function toChecksumAddress(address: string): string {
  if (!ADDRESS_PATTERN.test(address)) {
    throw new InvalidAddressFormatError('Ethereum address must be 0x followed by 40 hex characters', {
      address,
    });
  }

  const lower = address.slice(2).toLowerCase();
  const hash = bytesToHex(keccak_256(utf8ToBytes(lower)));
  let result = '0x';
  for (let i = 0; i < lower.length; i++) {
    result += parseInt(hash[i], 16) >= 8 ? lower[i].toUpperCase() : lower[i];
  }
  return result;
}

/**
 * Accepts all-lowercase or all-uppercase hex without checksum; mixed case
 * must match EIP-55.
 */
export function validateEthAddress(address: string): void {
  if (!ADDRESS_PATTERN.test(address)) {
    throw new InvalidAddressFormatError('Ethereum address must be 0x followed by 40 hex characters', {
      address,
    });
  }
  const body = address.slice(2);
  if (body === body.toLowerCase() || body === body.toUpperCase()) {
    return;
  }
  if (toChecksumAddress(address) !== address) {
    throw new InvalidAddressFormatError('Ethereum address has an invalid EIP-55 checksum', { address });
  }
}

export function ethAddressFromPrivateKey(privateKeyHex: string, options: { checksum?: boolean } = {}): string {
  const key = parsePrivateKey(privateKeyHex, 'secp256k1');
  try {
    const address = ethAddressFromPublicKey(secp256k1PublicKey(key, false));
    return options.checksum ? toChecksumAddress(address) : address;
  } finally {
    key.fill(0);
  }
}
