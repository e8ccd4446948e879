import * as ed from '@noble/ed25519';
import * as secp from '@noble/secp256k1';
import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';
import { sha512 } from '@noble/hashes/sha512';
import { hexToBytes, isHexString, stripHexPrefix } from '@seedvault/helpers';

import type { Curve } from './chains';
import { InvalidKeyEncodingError, SignatureFailureError } from './errors';

// Synchronous hashing for RFC 6979 nonces and Ed25519 key expansion.
secp.etc.hmacSha256Sync = (key, ...messages) => hmac(sha256, key, secp.etc.concatBytes(...messages));
ed.etc.sha512Sync = (...messages) => sha512(ed.etc.concatBytes(...messages));

export const PRIVATE_KEY_LENGTH = 32;
export const SECP256K1_ORDER = secp.CURVE.n;

export interface RecoverableSignature {
  r: bigint;
  s: bigint;
  /** 0 or 1 */
  recovery: number;
}

/**
 * Decode a 32-byte private key from hex (an optional 0x prefix is accepted).
 * The returned buffer belongs to the caller, who must zero it.
 */
export function parsePrivateKey(privateKeyHex: string, curve: Curve): Uint8Array {
  const normalized = stripHexPrefix(privateKeyHex);
  if (normalized.length !== PRIVATE_KEY_LENGTH * 2 || !isHexString(normalized)) {
    throw new InvalidKeyEncodingError('Private key must be 32 bytes of hex', {
      length: normalized.length,
    });
  }

  const key = hexToBytes(normalized);
  if (curve === 'secp256k1' && !secp.utils.isValidPrivateKey(key)) {
    key.fill(0);
    throw new InvalidKeyEncodingError('Private key is outside the secp256k1 scalar range');
  }
  return key;
}

export function isValidSecp256k1Key(key: Uint8Array): boolean {
  return secp.utils.isValidPrivateKey(key);
}

export function secp256k1PublicKey(privateKey: Uint8Array, compressed: boolean): Uint8Array {
  return secp.getPublicKey(privateKey, compressed);
}

export function ed25519PublicKey(privateKey: Uint8Array): Uint8Array {
  return ed.getPublicKey(privateKey);
}

/** RFC 6979 deterministic ECDSA with low-s normalisation. */
export function signSecp256k1(messageHash: Uint8Array, privateKey: Uint8Array): RecoverableSignature {
  try {
    const signature = secp.sign(messageHash, privateKey, { lowS: true });
    return { r: signature.r, s: signature.s, recovery: signature.recovery };
  } catch (error) {
    throw new SignatureFailureError('secp256k1 signing failed', { cause: error });
  }
}

export function recoverSecp256k1PublicKey(
  messageHash: Uint8Array,
  signature: RecoverableSignature,
  compressed = false
): Uint8Array {
  try {
    return new secp.Signature(signature.r, signature.s, signature.recovery)
      .recoverPublicKey(messageHash)
      .toRawBytes(compressed);
  } catch (error) {
    throw new SignatureFailureError('Public key recovery failed', { cause: error });
  }
}

export function signEd25519(message: Uint8Array, privateKey: Uint8Array): Uint8Array {
  try {
    return ed.sign(message, privateKey);
  } catch (error) {
    throw new SignatureFailureError('Ed25519 signing failed', { cause: error });
  }
}

export function verifyEd25519(signature: Uint8Array, message: Uint8Array, publicKey: Uint8Array): boolean {
  return ed.verify(signature, message, publicKey);
}
