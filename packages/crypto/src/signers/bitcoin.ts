import { sha256 } from '@noble/hashes/sha256';
import { bigintToFixedBytes, bytesToHex, concatBytes, utf8ToBytes } from '@seedvault/helpers';

import { validateBtcAddress } from '../address/bitcoin';
import { resolveConfig, type CryptoConfig } from '../config';
import { parsePrivateKey, secp256k1PublicKey, signSecp256k1 } from '../keys';
import { SecureMemory } from '../memory';
import { parseCanonicalAmount, parseSafeUnsigned } from './quantity';

export interface BitcoinTransactionParams {
  privateKey: string;
  to: string;
  /** satoshis as a decimal string */
  value: string;
  /** sat/vB */
  feeRate: number;
}

/**
 * Signed payment intent for a backend that assembles the actual Bitcoin
 * transaction. Key order is fixed.
 */
export interface BitcoinSignedEnvelope {
  type: 'bitcoin';
  to: string;
  value: string;
  fee_rate: number;
  /** SHA-256 of the compressed public key */
  private_key_hash: string;
  /** compressed public key hex */
  public_key: string;
  /** compact r||s hex over SHA256d("btc:<to>:<value>:<fee_rate>") */
  signature: string;
}

export function bitcoinIntentMessage(to: string, value: string, feeRate: number): string {
  return `btc:${to}:${value}:${feeRate}`;
}

export function doubleSha256(data: Uint8Array): Uint8Array {
  return sha256(sha256(data));
}

export class BitcoinTxSigner {
  static signTransaction(params: BitcoinTransactionParams, config: CryptoConfig = {}): string {
    return JSON.stringify(BitcoinTxSigner.signEnvelope(params, config));
  }

  static signEnvelope(params: BitcoinTransactionParams, config: CryptoConfig = {}): BitcoinSignedEnvelope {
    const { bitcoinNetwork, logger } = resolveConfig(config);
    validateBtcAddress(params.to, bitcoinNetwork);
    const value = parseCanonicalAmount('value', params.value, 64);
    const feeRate = parseSafeUnsigned('feeRate', params.feeRate, 64);
    const digest = doubleSha256(utf8ToBytes(bitcoinIntentMessage(params.to, value, feeRate)));

    return SecureMemory.use<BitcoinSignedEnvelope>(parsePrivateKey(params.privateKey, 'secp256k1'), (key) => {
      const publicKey = secp256k1PublicKey(key, true);
      const signature = signSecp256k1(digest, key);
      logger.debug('Signed Bitcoin payment intent', { network: bitcoinNetwork });

      return {
        type: 'bitcoin',
        to: params.to,
        value,
        fee_rate: feeRate,
        private_key_hash: bytesToHex(sha256(publicKey)),
        public_key: bytesToHex(publicKey),
        signature: bytesToHex(concatBytes(bigintToFixedBytes(signature.r, 32), bigintToFixedBytes(signature.s, 32))),
      };
    });
  }
}
