import { base64 } from '@scure/base';
import { utf8ToBytes } from '@seedvault/helpers';

import { validateSolAddress } from '../address/solana';
import { resolveConfig, type CryptoConfig } from '../config';
import { parsePrivateKey, signEd25519 } from '../keys';
import { SecureMemory } from '../memory';
import { parseCanonicalAmount } from './quantity';

export interface SolanaTransactionParams {
  privateKey: string;
  to: string;
  /** lamports as a decimal string */
  value: string;
  /** embedded in the signed message as given */
  recentBlockhash: string;
}

export function solanaIntentMessage(to: string, value: string, recentBlockhash: string): string {
  return `sol:${to}:${value}:${recentBlockhash}`;
}

export class SolanaTxSigner {
  /** Ed25519 signature over the transfer intent, Base64 encoded. */
  static signTransaction(params: SolanaTransactionParams, config: CryptoConfig = {}): string {
    validateSolAddress(params.to);
    const value = parseCanonicalAmount('value', params.value, 64);
    const message = utf8ToBytes(solanaIntentMessage(params.to, value, params.recentBlockhash));

    const signature = SecureMemory.use(parsePrivateKey(params.privateKey, 'ed25519'), (key) =>
      signEd25519(message, key)
    );
    resolveConfig(config).logger.debug('Signed Solana transfer intent');
    return base64.encode(signature);
  }
}
