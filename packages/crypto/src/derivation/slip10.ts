import { hmac } from '@noble/hashes/hmac';
import { sha512 } from '@noble/hashes/sha512';
import { utf8ToBytes, writeUint32BE } from '@seedvault/helpers';

import { InvalidDerivationPathError } from '../errors';
import { SecureMemory } from '../memory';
import { formatDerivationPath, HARDENED_OFFSET, type PathComponent } from './path';

const MASTER_HMAC_KEY = utf8ToBytes('ed25519 seed');

/**
 * SLIP-0010 private-key derivation on Ed25519. Only hardened components
 * exist on this curve.
 */
export function deriveSlip10PrivateKey(seed: Uint8Array, path: readonly PathComponent[]): Uint8Array {
  const softIndex = path.findIndex((component) => !component.hardened);
  if (softIndex !== -1) {
    throw new InvalidDerivationPathError('Ed25519 derivation supports hardened components only', {
      component: formatDerivationPath(path.slice(0, softIndex + 1)),
    });
  }

  const master = hmac(sha512, MASTER_HMAC_KEY, seed);
  let key = master.slice(0, 32);
  let chainCode = master.slice(32);
  master.fill(0);

  let completed = false;
  try {
    for (const component of path) {
      const data = new Uint8Array(37);
      data.set(key, 1);
      writeUint32BE(data, 33, component.index + HARDENED_OFFSET);

      const digest = hmac(sha512, chainCode, data);
      SecureMemory.zeroize(data, key, chainCode);
      key = digest.slice(0, 32);
      chainCode = digest.slice(32);
      digest.fill(0);
    }

    completed = true;
    return key;
  } finally {
    chainCode.fill(0);
    if (!completed) {
      key.fill(0);
    }
  }
}
