import { base64 } from '@scure/base';
import { utf8ToBytes } from '@seedvault/helpers';

import { validateTonAddress } from '../address/ton';
import { resolveConfig, type CryptoConfig } from '../config';
import { parsePrivateKey, signEd25519 } from '../keys';
import { SecureMemory } from '../memory';
import { parseCanonicalAmount, parseSafeUnsigned } from './quantity';

export interface TonTransactionParams {
  privateKey: string;
  to: string;
  /** nanotons as a decimal string */
  value: string;
  seqno: number;
}

export function tonIntentMessage(to: string, value: string, seqno: number): string {
  return `ton:${to}:${value}:${seqno}`;
}

export class TonTxSigner {
  /** Ed25519 signature over the transfer intent, Base64 encoded. */
  static signTransaction(params: TonTransactionParams, config: CryptoConfig = {}): string {
    validateTonAddress(params.to);
    const value = parseCanonicalAmount('value', params.value, 64);
    const seqno = parseSafeUnsigned('seqno', params.seqno, 32);
    const message = utf8ToBytes(tonIntentMessage(params.to, value, seqno));

    const signature = SecureMemory.use(parsePrivateKey(params.privateKey, 'ed25519'), (key) =>
      signEd25519(message, key)
    );
    resolveConfig(config).logger.debug('Signed TON transfer intent', { seqno });
    return base64.encode(signature);
  }
}
