import { bytesToHex, copyBytes } from '@seedvault/helpers';

import { btcAddressFromPrivateKey } from './address/bitcoin';
import { ethAddressFromPrivateKey } from './address/ethereum';
import { solAddressFromPrivateKey } from './address/solana';
import { tonAddressFromPrivateKey } from './address/ton';
import { assertNever, chainCurve, chainDerivationPath, type Chain, type Curve } from './chains';
import { resolveConfig, type CryptoConfig, type ResolvedCryptoConfig } from './config';
import { deriveBip32PrivateKey } from './derivation/bip32';
import { assertValidIndex, isValidDerivationPath, parseDerivationPath } from './derivation/path';
import { deriveSlip10PrivateKey } from './derivation/slip10';
import { InvalidSeedError, isWalletCoreError } from './errors';
import { ed25519PublicKey, parsePrivateKey } from './keys';

/**
 * Derives chain-specific private keys and addresses from a master seed.
 *
 * The deriver keeps its own copy of the seed; call {@link KeyDeriver.dispose}
 * (or use {@link KeyDeriver.withSeed}) to zero it. Private keys are returned
 * as hex without a `0x` prefix. Any seed length is accepted; the secp256k1
 * chains raise {@link InvalidSeedError} on derivation unless it is 16 to 64
 * bytes.
 */
export class KeyDeriver {
  private readonly seed: Uint8Array;
  private readonly config: ResolvedCryptoConfig;
  private disposed = false;

  constructor(seed: Uint8Array, config: CryptoConfig = {}) {
    this.seed = copyBytes(seed);
    this.config = resolveConfig(config);
  }

  /**
   * Run `fn` with a deriver over `seed`, disposing it afterwards.
   */
  static async withSeed<T>(
    seed: Uint8Array,
    fn: (deriver: KeyDeriver) => T | Promise<T>,
    config: CryptoConfig = {}
  ): Promise<T> {
    const deriver = new KeyDeriver(seed, config);
    try {
      return await fn(deriver);
    } finally {
      deriver.dispose();
    }
  }

  static derivationPath(chain: Chain, index: number): string {
    assertValidIndex(index);
    return chainDerivationPath(chain, index);
  }

  static isValidPath(path: string): boolean {
    return isValidDerivationPath(path);
  }

  clone(): KeyDeriver {
    this.ensureActive();
    return new KeyDeriver(this.seed, this.config);
  }

  dispose(): void {
    this.seed.fill(0);
    this.disposed = true;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  derivePrivateKey(chain: Chain, index: number): string {
    const path = KeyDeriver.derivationPath(chain, index);
    this.config.logger.debug('Deriving private key', { chain, index, path });
    return this.derivePrivateKeyAtPath(chainCurve(chain), path);
  }

  deriveEthPrivateKey(index: number): string {
    return this.derivePrivateKey('ethereum', index);
  }

  deriveBtcPrivateKey(index: number): string {
    return this.derivePrivateKey('bitcoin', index);
  }

  deriveSolPrivateKey(index: number): string {
    return this.derivePrivateKey('solana', index);
  }

  deriveTonPrivateKey(index: number): string {
    return this.derivePrivateKey('ton', index);
  }

  derivePrivateKeyAtPath(curve: Curve, path: string): string {
    this.ensureActive();
    const components = parseDerivationPath(path);
    let key: Uint8Array | undefined;
    try {
      key = curve === 'secp256k1'
        ? deriveBip32PrivateKey(this.seed, components)
        : deriveSlip10PrivateKey(this.seed, components);
      return bytesToHex(key);
    } catch (error) {
      if (isWalletCoreError(error)) {
        this.config.logger.warn('Key derivation failed', { curve, path, code: error.code });
      }
      throw error;
    } finally {
      key?.fill(0);
    }
  }

  getAddress(chain: Chain, privateKeyHex: string): string {
    switch (chain) {
      case 'ethereum':
        return this.getEthAddress(privateKeyHex);
      case 'bitcoin':
        return this.getBtcAddress(privateKeyHex);
      case 'solana':
        return this.getSolAddress(privateKeyHex);
      case 'ton':
        return this.getTonAddress(privateKeyHex);
      default:
        return assertNever(chain);
    }
  }

  /** Lowercase unless `checksumEthAddresses` is configured. */
  getEthAddress(privateKeyHex: string): string {
    return ethAddressFromPrivateKey(privateKeyHex, { checksum: this.config.checksumEthAddresses });
  }

  getBtcAddress(privateKeyHex: string): string {
    return btcAddressFromPrivateKey(privateKeyHex, this.config.bitcoinNetwork);
  }

  getSolAddress(privateKeyHex: string): string {
    return solAddressFromPrivateKey(privateKeyHex);
  }

  getTonAddress(privateKeyHex: string): string {
    return tonAddressFromPrivateKey(privateKeyHex, this.config.tonWorkchain);
  }

  getSolPublicKey(privateKeyHex: string): string {
    return ed25519PublicKeyHex(privateKeyHex);
  }

  getTonPublicKey(privateKeyHex: string): string {
    return ed25519PublicKeyHex(privateKeyHex);
  }

  private ensureActive(): void {
    if (this.disposed) {
      throw new InvalidSeedError('KeyDeriver has been disposed');
    }
  }
}

export function ed25519PublicKeyHex(privateKeyHex: string): string {
  const key = parsePrivateKey(privateKeyHex, 'ed25519');
  try {
    return bytesToHex(ed25519PublicKey(key));
  } finally {
    key.fill(0);
  }
}

export function addressFromPrivateKey(chain: Chain, privateKeyHex: string, config: CryptoConfig = {}): string {
  const resolved = resolveConfig(config);
  switch (chain) {
    case 'ethereum':
      return ethAddressFromPrivateKey(privateKeyHex, { checksum: resolved.checksumEthAddresses });
    case 'bitcoin':
      return btcAddressFromPrivateKey(privateKeyHex, resolved.bitcoinNetwork);
    case 'solana':
      return solAddressFromPrivateKey(privateKeyHex);
    case 'ton':
      return tonAddressFromPrivateKey(privateKeyHex, resolved.tonWorkchain);
    default:
      return assertNever(chain);
  }
}
