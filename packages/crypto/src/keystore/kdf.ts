import scrypt from 'scrypt-js';
import { getWebCrypto, hexToBytes, utf8ToBytes } from '@seedvault/helpers';

import { isWalletCoreError, UnsupportedKdfError } from '../errors';
import type { KeystoreKdf } from './schema';

const SUPPORTED_PRF = 'hmac-sha256';

/**
 * scrypt through scrypt-js. Failures raised by the library surface as
 * {@link UnsupportedKdfError} with the original error as `cause`.
 */
export async function scryptKey(
  passwordBytes: Uint8Array,
  salt: Uint8Array,
  params: { n: number; r: number; p: number; dklen: number }
): Promise<Uint8Array> {
  try {
    return await scrypt.scrypt(passwordBytes, salt, params.n, params.r, params.p, params.dklen);
  } catch (error) {
    throw new UnsupportedKdfError('scrypt key derivation failed', { kdf: 'scrypt' }, { cause: error });
  }
}

async function pbkdf2Key(passwordBytes: Uint8Array, salt: Uint8Array, iterations: number, dklen: number) {
  const subtle = getWebCrypto().subtle;
  try {
    const baseKey = await subtle.importKey('raw', new Uint8Array(passwordBytes), 'PBKDF2', false, ['deriveBits']);
    const bits = await subtle.deriveBits(
      { name: 'PBKDF2', hash: 'SHA-256', salt: new Uint8Array(salt), iterations },
      baseKey,
      dklen * 8
    );
    return new Uint8Array(bits);
  } catch (error) {
    throw new UnsupportedKdfError('pbkdf2 key derivation failed', { kdf: 'pbkdf2' }, { cause: error });
  }
}

/**
 * Run the keystore's KDF over the UTF-8 password. The returned buffer holds
 * `dklen` bytes and belongs to the caller.
 */
export async function deriveKeystoreKey(password: string, kdf: KeystoreKdf): Promise<Uint8Array> {
  const passwordBytes = utf8ToBytes(password);
  try {
    switch (kdf.kdf) {
      case 'scrypt':
        return await scryptKey(passwordBytes, hexToBytes(kdf.kdfparams.salt), kdf.kdfparams);
      case 'pbkdf2': {
        const { c, dklen, prf, salt } = kdf.kdfparams;
        if (prf !== SUPPORTED_PRF) {
          throw new UnsupportedKdfError(`Unsupported pbkdf2 prf: ${prf}`, { kdf: 'pbkdf2', prf });
        }
        return await pbkdf2Key(passwordBytes, hexToBytes(salt), c, dklen);
      }
    }
  } catch (error) {
    if (isWalletCoreError(error)) {
      throw error;
    }
    throw new UnsupportedKdfError('Key derivation failed', { kdf: kdf.kdf }, { cause: error });
  } finally {
    passwordBytes.fill(0);
  }
}
