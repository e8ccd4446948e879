import { hmac } from '@noble/hashes/hmac';
import { sha512 } from '@noble/hashes/sha512';
import { bigintToFixedBytes, bytesToBigint, utf8ToBytes, writeUint32BE } from '@seedvault/helpers';

import { InvalidDerivationPathError, InvalidSeedError } from '../errors';
import { SECP256K1_ORDER, secp256k1PublicKey } from '../keys';
import { SecureMemory } from '../memory';
import { formatDerivationPath, HARDENED_OFFSET, type PathComponent } from './path';

const MASTER_HMAC_KEY = utf8ToBytes('Bitcoin seed');

export const MIN_SEED_LENGTH = 16;
export const MAX_SEED_LENGTH = 64;

/**
 * BIP32 private-key derivation on secp256k1. Returns the 32-byte child key;
 * the caller owns the buffer. Seeds must be 16 to 64 bytes.
 */
export function deriveBip32PrivateKey(seed: Uint8Array, path: readonly PathComponent[]): Uint8Array {
  if (seed.length < MIN_SEED_LENGTH || seed.length > MAX_SEED_LENGTH) {
    throw new InvalidSeedError(`BIP32 seed must be ${MIN_SEED_LENGTH} to ${MAX_SEED_LENGTH} bytes`, {
      length: seed.length,
    });
  }
  const master = hmac(sha512, MASTER_HMAC_KEY, seed);
  let key = master.slice(0, 32);
  let chainCode = master.slice(32);
  master.fill(0);

  let completed = false;
  try {
    const masterScalar = bytesToBigint(key);
    if (masterScalar === 0n || masterScalar >= SECP256K1_ORDER) {
      throw new InvalidDerivationPathError('Seed produces an invalid master key', { component: 'm' });
    }

    path.forEach((component, depth) => {
      const data = new Uint8Array(37);
      let digest: Uint8Array | undefined;
      try {
        if (component.hardened) {
          data.set(key, 1);
        } else {
          data.set(secp256k1PublicKey(key, true), 0);
        }
        writeUint32BE(data, 33, component.hardened ? component.index + HARDENED_OFFSET : component.index);

        digest = hmac(sha512, chainCode, data);
        const tweak = bytesToBigint(digest.subarray(0, 32));
        const child = (tweak + bytesToBigint(key)) % SECP256K1_ORDER;
        if (tweak >= SECP256K1_ORDER || child === 0n) {
          throw new InvalidDerivationPathError('Derivation produced an invalid child key', {
            component: formatDerivationPath(path.slice(0, depth + 1)),
          });
        }

        const nextKey = bigintToFixedBytes(child, 32);
        const nextChainCode = digest.slice(32);
        SecureMemory.zeroize(key, chainCode);
        key = nextKey;
        chainCode = nextChainCode;
      } finally {
        SecureMemory.zeroize(data, digest);
      }
    });

    completed = true;
    return key;
  } finally {
    chainCode.fill(0);
    if (!completed) {
      key.fill(0);
    }
  }
}
