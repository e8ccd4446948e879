import { assertNever } from '../chains';
import type { CryptoConfig } from '../config';
import { BitcoinTxSigner, type BitcoinTransactionParams } from './bitcoin';
import { EthereumTxSigner, type EthTransactionParams } from './ethereum';
import { SolanaTxSigner, type SolanaTransactionParams } from './solana';
import { TonTxSigner, type TonTransactionParams } from './ton';

export type SignRequest =
  | ({ chain: 'ethereum'; data?: string } & EthTransactionParams)
  | ({ chain: 'bitcoin' } & BitcoinTransactionParams)
  | ({ chain: 'solana' } & SolanaTransactionParams)
  | ({ chain: 'ton' } & TonTransactionParams);

/**
 * Sign with the chain's signer. Returns raw 0x hex for Ethereum, the JSON
 * envelope for Bitcoin and a Base64 signature for Solana and TON.
 */
export function signTransaction(request: SignRequest, config: CryptoConfig = {}): string {
  switch (request.chain) {
    case 'ethereum':
      return request.data === undefined
        ? EthereumTxSigner.signTransaction(request, config)
        : EthereumTxSigner.signTransactionWithData({ ...request, data: request.data }, config);
    case 'bitcoin':
      return BitcoinTxSigner.signTransaction(request, config);
    case 'solana':
      return SolanaTxSigner.signTransaction(request, config);
    case 'ton':
      return TonTxSigner.signTransaction(request, config);
    default:
      return assertNever(request);
  }
}

export { bitcoinIntentMessage, BitcoinTxSigner, doubleSha256 } from './bitcoin';
export type { BitcoinSignedEnvelope, BitcoinTransactionParams } from './bitcoin';
export { EthereumTxSigner, recoverTransactionSender } from './ethereum';
export type {
  EthTransactionParams,
  EthTransactionWithDataParams,
  RecoveredSender,
  UnsignedEthTransaction,
} from './ethereum';
export { hashEthMessage, recoverEthMessageSigner, signEd25519Message, signEthMessage } from './message';
export { parseCanonicalAmount, parseQuantity } from './quantity';
export type { Quantity } from './quantity';
export { solanaIntentMessage, SolanaTxSigner } from './solana';
export type { SolanaTransactionParams } from './solana';
export { tonIntentMessage, TonTxSigner } from './ton';
export type { TonTransactionParams } from './ton';
