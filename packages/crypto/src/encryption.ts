import { base64 } from '@scure/base';
import { concatBytes, getWebCrypto, randomBytes, utf8ToBytes } from '@seedvault/helpers';
import { z } from 'zod';

import type { CryptoConfig } from './config';
import { DecryptionFailedError, InvalidDataEncodingError, InvalidKeyEncodingError } from './errors';
import { scryptKey } from './keystore/kdf';
import { assertScryptCost } from './keystore/schema';
import { SecureMemory } from './memory';

export interface ScryptCost {
  N: number; // CPU/memory cost parameter
  r: number; // Block size
  p: number; // Parallelization parameter
}

export interface EncryptedData {
  /** AES-256-GCM output, authentication tag included */
  ciphertext: Uint8Array;
  salt: Uint8Array;
  iv: Uint8Array;
  kdfParams: ScryptCost;
}

export interface EncryptionOptions extends CryptoConfig {
  kdfParams?: Partial<ScryptCost>;
}

const base64Bytes = z.string().transform((value, ctx) => {
  try {
    return base64.decode(value);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected Base64' });
    return z.NEVER;
  }
});

const serializedSchema = z.object({
  ciphertext: base64Bytes,
  salt: base64Bytes,
  iv: base64Bytes.refine((iv) => iv.length === 12, { message: 'Expected 12 bytes' }),
  kdfParams: z.object({
    N: z.number().int().positive(),
    r: z.number().int().positive(),
    p: z.number().int().positive(),
  }),
});

/**
 * Password-based encryption of wallet secrets at rest: scrypt KDF and
 * AES-256-GCM.
 */
export class EncryptionService {
  private static readonly DEFAULT_N = 32768; // 2^15
  private static readonly DEFAULT_R = 8;
  private static readonly DEFAULT_P = 1;
  private static readonly KEY_LENGTH = 32; // 256 bits for AES-256
  private static readonly SALT_LENGTH = 16;
  private static readonly IV_LENGTH = 12; // Recommended for AES-GCM

  static generateSalt(): Uint8Array {
    return randomBytes(this.SALT_LENGTH);
  }

  /**
   * Derive a 32-byte AES key with scrypt. Costs above the configured limits
   * raise `UnsupportedKdfError` before any work is done.
   */
  static async deriveKey(
    password: string,
    salt: Uint8Array,
    kdfParams: ScryptCost,
    config: CryptoConfig = {}
  ): Promise<Uint8Array> {
    const { N, r, p } = kdfParams;
    assertScryptCost({ n: N, r, p }, config);
    const passwordBytes = utf8ToBytes(password);
    try {
      return await scryptKey(passwordBytes, salt, { n: N, r, p, dklen: this.KEY_LENGTH });
    } finally {
      passwordBytes.fill(0);
    }
  }

  /**
   * Encrypt with a derived key under a fresh nonce. Returns nonce || ciphertext.
   */
  static async seal(key: Uint8Array, plaintext: Uint8Array): Promise<Uint8Array> {
    const iv = randomBytes(this.IV_LENGTH);
    return concatBytes(iv, await aesGcm('encrypt', key, iv, plaintext));
  }

  /** Inverse of {@link EncryptionService.seal}. */
  static async open(key: Uint8Array, sealed: Uint8Array): Promise<Uint8Array> {
    if (sealed.length < this.IV_LENGTH) {
      throw new InvalidDataEncodingError('Invalid ciphertext length', { length: sealed.length });
    }
    return aesGcm('decrypt', key, sealed.subarray(0, this.IV_LENGTH), sealed.subarray(this.IV_LENGTH));
  }

  /**
   * Encrypt data using password-based encryption
   */
  static async encrypt(data: Uint8Array, password: string, options: EncryptionOptions = {}): Promise<EncryptedData> {
    const kdfParams: ScryptCost = {
      N: options.kdfParams?.N ?? this.DEFAULT_N,
      r: options.kdfParams?.r ?? this.DEFAULT_R,
      p: options.kdfParams?.p ?? this.DEFAULT_P,
    };
    const salt = this.generateSalt();
    const iv = randomBytes(this.IV_LENGTH);

    const derivedKey = await this.deriveKey(password, salt, kdfParams, options);
    const ciphertext = await SecureMemory.useAsync(derivedKey, (key) => aesGcm('encrypt', key, iv, data));

    return { ciphertext, salt, iv, kdfParams };
  }

  /**
   * Decrypt with the password and the stored parameters. A wrong password
   * or tampered data raises `DecryptionFailedError`.
   */
  static async decrypt(encrypted: EncryptedData, password: string, config: CryptoConfig = {}): Promise<Uint8Array> {
    const derivedKey = await this.deriveKey(password, encrypted.salt, encrypted.kdfParams, config);
    return SecureMemory.useAsync(derivedKey, (key) => aesGcm('decrypt', key, encrypted.iv, encrypted.ciphertext));
  }

  /**
   * Serialize encrypted data to a JSON string with Base64 byte fields
   */
  static serialize(encrypted: EncryptedData): string {
    return JSON.stringify({
      ciphertext: base64.encode(encrypted.ciphertext),
      salt: base64.encode(encrypted.salt),
      iv: base64.encode(encrypted.iv),
      kdfParams: encrypted.kdfParams,
    });
  }

  static deserialize(serialized: string): EncryptedData {
    let raw: unknown;
    try {
      raw = JSON.parse(serialized);
    } catch (error) {
      throw new InvalidDataEncodingError('Encrypted data is not valid JSON', { reason: String(error) });
    }
    const parsed = serializedSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue?.path.join('.') || 'data';
      throw new InvalidDataEncodingError(`Missing or invalid '${field}' field`, { field });
    }
    return parsed.data;
  }
}

async function aesGcm(
  operation: 'encrypt' | 'decrypt',
  key: Uint8Array,
  iv: Uint8Array,
  data: Uint8Array
): Promise<Uint8Array> {
  if (key.length !== 32) {
    throw new InvalidKeyEncodingError('AES-256-GCM key must be 32 bytes', { length: key.length });
  }

  const subtle = getWebCrypto().subtle;
  const rawKey = new Uint8Array(key);
  try {
    const cryptoKey = await subtle.importKey('raw', rawKey, { name: 'AES-GCM' }, false, [operation]);
    const params = { name: 'AES-GCM', iv: new Uint8Array(iv) };
    if (operation === 'encrypt') {
      const plaintext = new Uint8Array(data);
      try {
        return new Uint8Array(await subtle.encrypt(params, cryptoKey, plaintext));
      } finally {
        plaintext.fill(0);
      }
    }
    try {
      return new Uint8Array(await subtle.decrypt(params, cryptoKey, new Uint8Array(data)));
    } catch (error) {
      throw new DecryptionFailedError({ cause: error });
    }
  } finally {
    rawKey.fill(0);
  }
}
