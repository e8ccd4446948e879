import { bytesToHex, getWebCrypto, hexToBytes, randomBytes } from '@seedvault/helpers';

import { ethAddressFromPublicKey } from '../address/ethereum';
import { resolveConfig, type CryptoConfig } from '../config';
import { isWalletCoreError } from '../errors';
import { parsePrivateKey, secp256k1PublicKey } from '../keys';
import { SecureMemory } from '../memory';
import {
  assertSupportedCipher,
  computeKeystoreMac,
  decryptKeystoreCiphertext,
  encryptKeystorePlaintext,
  IV_LENGTH,
  SUPPORTED_CIPHER,
  verifyKeystoreMac,
} from './cipher';
import { deriveKeystoreKey } from './kdf';
import { parseKdfParams, parseKeystore, type KdfName, type Keystore } from './schema';

export interface EncryptKeystoreOptions extends CryptoConfig {
  /** default "scrypt" */
  kdf?: KdfName;
  /** scrypt cost (default 262144) */
  n?: number;
  /** scrypt block size (default 8) */
  r?: number;
  /** scrypt parallelism (default 1) */
  p?: number;
  /** pbkdf2 iterations (default 262144) */
  c?: number;
}

const DEFAULT_SCRYPT = { n: 262144, r: 8, p: 1 };
const DEFAULT_PBKDF2_ITERATIONS = 262144;
const DKLEN = 32;
const SALT_LENGTH = 32;

/**
 * Decrypt a Web3 Secret Storage V3 document and return the private key as
 * `0x`-prefixed hex.
 *
 * Runs Parse, DeriveKey, VerifyMAC and Decrypt in order. The cipher is
 * checked before the KDF runs.
 */
export async function decryptKeystore(json: unknown, password: string, config: CryptoConfig = {}): Promise<string> {
  const { logger } = resolveConfig(config);
  const keystore = parseKeystore(json, config);
  const { cipher, cipherparams, ciphertext, mac } = keystore.crypto;
  logger.debug('Decrypting keystore', { kdf: keystore.crypto.kdf, cipher });

  assertSupportedCipher(cipher);

  let derivedKey: Uint8Array | undefined;
  let plaintext: Uint8Array | undefined;
  try {
    derivedKey = await deriveKeystoreKey(password, keystore.crypto);
    const ciphertextBytes = hexToBytes(ciphertext);
    verifyKeystoreMac(derivedKey, ciphertextBytes, hexToBytes(mac));
    plaintext = await decryptKeystoreCiphertext(derivedKey, hexToBytes(cipherparams.iv), ciphertextBytes, cipher);
    return `0x${bytesToHex(plaintext)}`;
  } catch (error) {
    if (isWalletCoreError(error)) {
      logger.warn('Keystore decryption failed', { code: error.code });
    }
    throw error;
  } finally {
    SecureMemory.zeroize(derivedKey, plaintext);
  }
}

/**
 * Encrypt a secp256k1 private key into a Keystore V3 JSON string with
 * aes-128-ctr and a random salt, IV and id.
 */
export async function encryptKeystore(
  privateKeyHex: string,
  password: string,
  options: EncryptKeystoreOptions = {}
): Promise<string> {
  const { logger } = resolveConfig(options);
  const kdfName = options.kdf ?? 'scrypt';
  const salt = bytesToHex(randomBytes(SALT_LENGTH));
  const kdf =
    kdfName === 'scrypt'
      ? parseKdfParams(
          'scrypt',
          {
            dklen: DKLEN,
            n: options.n ?? DEFAULT_SCRYPT.n,
            r: options.r ?? DEFAULT_SCRYPT.r,
            p: options.p ?? DEFAULT_SCRYPT.p,
            salt,
          },
          options
        )
      : parseKdfParams(
          'pbkdf2',
          { c: options.c ?? DEFAULT_PBKDF2_ITERATIONS, dklen: DKLEN, prf: 'hmac-sha256', salt },
          options
        );

  const privateKey = parsePrivateKey(privateKeyHex, 'secp256k1');
  const iv = randomBytes(IV_LENGTH);
  let derivedKey: Uint8Array | undefined;
  try {
    const address = ethAddressFromPublicKey(secp256k1PublicKey(privateKey, false)).slice(2);
    logger.debug('Encrypting keystore', { kdf: kdfName, cipher: SUPPORTED_CIPHER });

    derivedKey = await deriveKeystoreKey(password, kdf);
    const ciphertext = await encryptKeystorePlaintext(derivedKey, iv, privateKey);
    const mac = computeKeystoreMac(derivedKey, ciphertext);

    const keystore: Keystore = {
      version: 3,
      id: getWebCrypto().randomUUID(),
      address,
      crypto: {
        cipher: SUPPORTED_CIPHER,
        cipherparams: { iv: bytesToHex(iv) },
        ciphertext: bytesToHex(ciphertext),
        mac: bytesToHex(mac),
        ...kdf,
      },
    };

    return JSON.stringify(keystore);
  } finally {
    SecureMemory.zeroize(privateKey, derivedKey);
  }
}
