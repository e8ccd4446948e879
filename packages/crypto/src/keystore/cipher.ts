import { keccak_256 } from '@noble/hashes/sha3';
import { concatBytes, getWebCrypto } from '@seedvault/helpers';

import { MacVerificationFailedError, UnsupportedCipherError } from '../errors';
import { SecureMemory } from '../memory';

export const SUPPORTED_CIPHER = 'aes-128-ctr';
export const IV_LENGTH = 16;
const MAC_COMPARE_LENGTH = 16;

export function assertSupportedCipher(cipher: string): void {
  if (cipher !== SUPPORTED_CIPHER) {
    throw new UnsupportedCipherError(cipher);
  }
}

/** Keccak-256 over dk[16:32] followed by the ciphertext. */
export function computeKeystoreMac(derivedKey: Uint8Array, ciphertext: Uint8Array): Uint8Array {
  const input = concatBytes(derivedKey.subarray(16, 32), ciphertext);
  try {
    return keccak_256(input);
  } finally {
    input.fill(0);
  }
}

/**
 * Compare the first 16 bytes of the computed and stored MACs in constant time.
 */
export function verifyKeystoreMac(derivedKey: Uint8Array, ciphertext: Uint8Array, mac: Uint8Array): void {
  const computed = computeKeystoreMac(derivedKey, ciphertext);
  const matches =
    mac.length >= MAC_COMPARE_LENGTH &&
    SecureMemory.constantTimeEqual(computed.subarray(0, MAC_COMPARE_LENGTH), mac.subarray(0, MAC_COMPARE_LENGTH));
  if (!matches) {
    throw new MacVerificationFailedError();
  }
}

async function aes128Ctr(
  operation: 'encrypt' | 'decrypt',
  derivedKey: Uint8Array,
  iv: Uint8Array,
  data: Uint8Array
): Promise<Uint8Array> {
  if (iv.length !== IV_LENGTH) {
    throw new RangeError(`IV must be ${IV_LENGTH} bytes`);
  }

  const subtle = getWebCrypto().subtle;
  const rawKey = new Uint8Array(derivedKey.subarray(0, 16));
  try {
    const key = await subtle.importKey('raw', rawKey, { name: 'AES-CTR' }, false, [operation]);
    const params = { name: 'AES-CTR', counter: new Uint8Array(iv), length: 128 };
    const input = new Uint8Array(data);
    try {
      const output =
        operation === 'encrypt'
          ? await subtle.encrypt(params, key, input)
          : await subtle.decrypt(params, key, input);
      return new Uint8Array(output);
    } finally {
      input.fill(0);
    }
  } finally {
    rawKey.fill(0);
  }
}

/**
 * Decrypt with dk[0:16] as the AES key. The plaintext belongs to the caller.
 */
export async function decryptKeystoreCiphertext(
  derivedKey: Uint8Array,
  iv: Uint8Array,
  ciphertext: Uint8Array,
  cipher: string = SUPPORTED_CIPHER
): Promise<Uint8Array> {
  assertSupportedCipher(cipher);
  return aes128Ctr('decrypt', derivedKey, iv, ciphertext);
}

export async function encryptKeystorePlaintext(
  derivedKey: Uint8Array,
  iv: Uint8Array,
  plaintext: Uint8Array
): Promise<Uint8Array> {
  return aes128Ctr('encrypt', derivedKey, iv, plaintext);
}
