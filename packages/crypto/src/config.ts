import { NOOP_LOGGER, type CryptoLogger } from './logger';

export type BitcoinNetwork = 'mainnet' | 'testnet';

/** TON basechain (0) or masterchain (-1). */
export type TonWorkchain = 0 | -1;

/**
 * Options shared by the deriver, the keystore codec and the signers.
 */
export interface CryptoConfig {
  /** Bitcoin network for address encoding and validation (default: "mainnet") */
  bitcoinNetwork?: BitcoinNetwork;

  /** Workchain prefix for raw TON addresses (default: 0) */
  tonWorkchain?: TonWorkchain;

  /**
   * Return EIP-55 mixed-case Ethereum addresses instead of lowercase hex.
   * @default false
   */
  checksumEthAddresses?: boolean;

  /** Largest scrypt N accepted from a keystore document (default: 2^20) */
  maxScryptN?: number;

  /** Largest scrypt working set, `128 * n * r` bytes (default: 1 GiB) */
  maxScryptMemory?: number;

  /** Largest scrypt p accepted from a keystore document (default: 16) */
  maxScryptParallelism?: number;

  /** Largest PBKDF2 iteration count accepted from a keystore document (default: 10,000,000) */
  maxPbkdf2Iterations?: number;

  /** Receives non-sensitive diagnostics (default: no-op) */
  logger?: CryptoLogger;
}

export type ResolvedCryptoConfig = Required<CryptoConfig>;

export const DEFAULT_CONFIG: Readonly<ResolvedCryptoConfig> = Object.freeze<ResolvedCryptoConfig>({
  bitcoinNetwork: 'mainnet',
  tonWorkchain: 0,
  checksumEthAddresses: false,
  maxScryptN: 1 << 20,
  maxScryptMemory: 1 << 30,
  maxScryptParallelism: 16,
  maxPbkdf2Iterations: 10_000_000,
  logger: NOOP_LOGGER,
});

export function resolveConfig(config: CryptoConfig = {}): ResolvedCryptoConfig {
  const resolved: ResolvedCryptoConfig = {
    bitcoinNetwork: config.bitcoinNetwork ?? DEFAULT_CONFIG.bitcoinNetwork,
    tonWorkchain: config.tonWorkchain ?? DEFAULT_CONFIG.tonWorkchain,
    checksumEthAddresses: config.checksumEthAddresses ?? DEFAULT_CONFIG.checksumEthAddresses,
    maxScryptN: config.maxScryptN ?? DEFAULT_CONFIG.maxScryptN,
    maxScryptMemory: config.maxScryptMemory ?? DEFAULT_CONFIG.maxScryptMemory,
    maxScryptParallelism: config.maxScryptParallelism ?? DEFAULT_CONFIG.maxScryptParallelism,
    maxPbkdf2Iterations: config.maxPbkdf2Iterations ?? DEFAULT_CONFIG.maxPbkdf2Iterations,
    logger: config.logger ?? DEFAULT_CONFIG.logger,
  };

  if (!Number.isSafeInteger(resolved.maxScryptN) || resolved.maxScryptN < 2) {
    throw new RangeError('maxScryptN must be an integer of at least 2');
  }
  if (!Number.isSafeInteger(resolved.maxScryptMemory) || resolved.maxScryptMemory < 1) {
    throw new RangeError('maxScryptMemory must be a positive integer');
  }
  if (!Number.isSafeInteger(resolved.maxScryptParallelism) || resolved.maxScryptParallelism < 1) {
    throw new RangeError('maxScryptParallelism must be a positive integer');
  }
  if (!Number.isSafeInteger(resolved.maxPbkdf2Iterations) || resolved.maxPbkdf2Iterations < 1) {
    throw new RangeError('maxPbkdf2Iterations must be a positive integer');
  }

  return resolved;
}
