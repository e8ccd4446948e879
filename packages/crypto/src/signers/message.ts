import { keccak_256 } from '@noble/hashes/sha3';
import { bigintToFixedBytes, bytesToBigint, bytesToHex, concatBytes, hexToBytes, utf8ToBytes } from '@seedvault/helpers';

import { ethAddressFromPublicKey } from '../address/ethereum';
import { InvalidDataEncodingError } from '../errors';
import { parsePrivateKey, recoverSecp256k1PublicKey, signEd25519, signSecp256k1 } from '../keys';
import { SecureMemory } from '../memory';

function toBytes(message: string | Uint8Array): Uint8Array {
  return typeof message === 'string' ? utf8ToBytes(message) : message;
}

/** Keccak-256 of "\x19Ethereum Signed Message:\n" + length + message. */
export function hashEthMessage(message: string | Uint8Array): Uint8Array {
  const bytes = toBytes(message);
  const prefix = utf8ToBytes(`\x19Ethereum Signed Message:\n${bytes.length}`);
  return keccak_256(concatBytes(prefix, bytes));
}

/**
 * EIP-191 personal message signature: 0x hex of r (32) || s (32) || v,
 * with v 27 or 28.
 */
export function signEthMessage(privateKeyHex: string, message: string | Uint8Array): string {
  const hash = hashEthMessage(message);
  const signature = SecureMemory.use(parsePrivateKey(privateKeyHex, 'secp256k1'), (key) =>
    signSecp256k1(hash, key)
  );
  const bytes = concatBytes(
    bigintToFixedBytes(signature.r, 32),
    bigintToFixedBytes(signature.s, 32),
    Uint8Array.of(27 + signature.recovery)
  );
  return `0x${bytesToHex(bytes)}`;
}

/** Lowercase address that produced an EIP-191 signature. */
export function recoverEthMessageSigner(message: string | Uint8Array, signatureHex: string): string {
  let bytes: Uint8Array;
  try {
    bytes = hexToBytes(signatureHex);
  } catch (error) {
    throw new InvalidDataEncodingError('Signature must be hex', { reason: String(error) });
  }
  if (bytes.length !== 65 || (bytes[64] !== 27 && bytes[64] !== 28)) {
    throw new InvalidDataEncodingError('Signature must be 65 bytes with v of 27 or 28', { length: bytes.length });
  }

  const publicKey = recoverSecp256k1PublicKey(hashEthMessage(message), {
    r: bytesToBigint(bytes.subarray(0, 32)),
    s: bytesToBigint(bytes.subarray(32, 64)),
    recovery: bytes[64] - 27,
  });
  return ethAddressFromPublicKey(publicKey);
}

/** Raw 64-byte Ed25519 signature as hex. */
export function signEd25519Message(privateKeyHex: string, message: string | Uint8Array): string {
  const bytes = toBytes(message);
  return bytesToHex(
    SecureMemory.use(parsePrivateKey(privateKeyHex, 'ed25519'), (key) => signEd25519(bytes, key))
  );
}
