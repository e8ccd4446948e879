import { keccak_256 } from '@noble/hashes/sha3';
import { bytesToHex, hexToBytes } from '@seedvault/helpers';

import { ethAddressFromPublicKey, validateEthAddress } from '../address/ethereum';
import { resolveConfig, type CryptoConfig } from '../config';
import { InvalidDataEncodingError, UnsupportedChainError } from '../errors';
import { parsePrivateKey, recoverSecp256k1PublicKey, signSecp256k1 } from '../keys';
import { SecureMemory } from '../memory';
import { decodeRlp, decodeRlpInteger, encodeRlp, encodeRlpInteger, isRlpList, type RlpItem } from '../rlp';
import { parseQuantity, type Quantity } from './quantity';

export interface EthTransactionParams {
  /** 32-byte secp256k1 key, hex with optional 0x */
  privateKey: string;
  to: string;
  /** wei as a decimal string */
  value: string;
  nonce: Quantity;
  gasPrice: Quantity;
  gasLimit: Quantity;
  chainId: number;
}

export interface EthTransactionWithDataParams extends EthTransactionParams {
  /** hex calldata; "" and "0x" mean empty */
  data: string;
}

export interface UnsignedEthTransaction {
  from: string;
  to: string;
  /** 0x hex quantities */
  value: string;
  nonce: string;
  gasPrice: string;
  gasLimit: string;
  chainId: number;
  data: string;
}

export interface RecoveredSender {
  /** lowercase 0x address */
  address: string;
  /** 0x04-prefixed uncompressed public key hex */
  publicKey: string;
  /** undefined for pre-EIP-155 signatures (v = 27 or 28) */
  chainId: number | undefined;
  recovery: number;
}

interface LegacyFields {
  nonce: bigint;
  gasPrice: bigint;
  gasLimit: bigint;
  to: Uint8Array;
  value: bigint;
  data: Uint8Array;
  chainId: bigint;
}

const DATA_PATTERN = /^(0x)?([0-9a-fA-F]{2})*$/;
const EMPTY = new Uint8Array(0);

function parseChainId(chainId: number): bigint {
  if (!Number.isSafeInteger(chainId) || chainId <= 0) {
    throw new UnsupportedChainError('chainId must be a positive safe integer', { chainId });
  }
  return BigInt(chainId);
}

function parseData(data: string): Uint8Array {
  if (!DATA_PATTERN.test(data)) {
    throw new InvalidDataEncodingError('Transaction data must be even-length hex', { length: data.length });
  }
  return hexToBytes(data);
}

function toHexQuantity(value: bigint): string {
  return `0x${value.toString(16)}`;
}

function prepareFields(params: Omit<EthTransactionParams, 'privateKey'>, data: string): LegacyFields {
  validateEthAddress(params.to);
  return {
    nonce: parseQuantity('nonce', params.nonce, 64),
    gasPrice: parseQuantity('gasPrice', params.gasPrice, 256),
    gasLimit: parseQuantity('gasLimit', params.gasLimit, 64),
    to: hexToBytes(params.to),
    value: parseQuantity('value', params.value, 256),
    data: parseData(data),
    chainId: parseChainId(params.chainId),
  };
}

function baseItems(fields: LegacyFields): RlpItem[] {
  return [
    encodeRlpInteger(fields.nonce),
    encodeRlpInteger(fields.gasPrice),
    encodeRlpInteger(fields.gasLimit),
    fields.to,
    encodeRlpInteger(fields.value),
    fields.data,
  ];
}

/**
 * EIP-155 legacy transaction signing.
 */
export class EthereumTxSigner {
  /**
   * Sign a plain value transfer and return the broadcast-ready raw
   * transaction as 0x hex.
   */
  static signTransaction(params: EthTransactionParams, config: CryptoConfig = {}): string {
    return EthereumTxSigner.sign(params, '', config);
  }

  static signTransactionWithData(params: EthTransactionWithDataParams, config: CryptoConfig = {}): string {
    return EthereumTxSigner.sign(params, params.data, config);
  }

  /**
   * Validate and normalise a transaction for a signer that lives elsewhere.
   */
  static buildTransaction(
    params: Omit<EthTransactionParams, 'privateKey'> & { from: string; data?: string }
  ): UnsignedEthTransaction {
    validateEthAddress(params.from);
    const fields = prepareFields(params, params.data ?? '');
    return {
      from: params.from,
      to: params.to,
      value: toHexQuantity(fields.value),
      nonce: toHexQuantity(fields.nonce),
      gasPrice: toHexQuantity(fields.gasPrice),
      gasLimit: toHexQuantity(fields.gasLimit),
      chainId: params.chainId,
      data: `0x${bytesToHex(fields.data)}`,
    };
  }

  private static sign(params: EthTransactionParams, data: string, config: CryptoConfig): string {
    const { logger } = resolveConfig(config);
    const fields = prepareFields(params, data);
    const unsigned = [...baseItems(fields), encodeRlpInteger(fields.chainId), EMPTY, EMPTY];
    const hash = keccak_256(encodeRlp(unsigned));

    const signature = SecureMemory.use(parsePrivateKey(params.privateKey, 'secp256k1'), (key) =>
      signSecp256k1(hash, key)
    );

    const v = fields.chainId * 2n + 35n + BigInt(signature.recovery);
    logger.debug('Signed EVM transaction', { chainId: params.chainId, dataLength: fields.data.length });

    const signed = [
      ...baseItems(fields),
      encodeRlpInteger(v),
      encodeRlpInteger(signature.r),
      encodeRlpInteger(signature.s),
    ];
    return `0x${bytesToHex(encodeRlp(signed))}`;
  }
}

function expectBytes(item: RlpItem | undefined, field: string): Uint8Array {
  if (item === undefined || isRlpList(item)) {
    throw new InvalidDataEncodingError(`Transaction field ${field} must be a byte string`, { field });
  }
  return item;
}

/**
 * Recover the signer of a legacy (EIP-155 or pre-EIP-155) raw transaction.
 */
export function recoverTransactionSender(rawTransaction: string): RecoveredSender {
  if (!DATA_PATTERN.test(rawTransaction)) {
    throw new InvalidDataEncodingError('Raw transaction must be hex');
  }
  const decoded = decodeRlp(hexToBytes(rawTransaction));
  if (!isRlpList(decoded) || decoded.length !== 9) {
    throw new InvalidDataEncodingError('Legacy transaction must be an RLP list of 9 items');
  }

  const names = ['nonce', 'gasPrice', 'gasLimit', 'to', 'value', 'data', 'v', 'r', 's'];
  const items = names.map((name, i) => expectBytes(decoded[i], name));
  const v = decodeRlpInteger(items[6]);
  const r = decodeRlpInteger(items[7]);
  const s = decodeRlpInteger(items[8]);

  let chainId: bigint | undefined;
  let recovery: number;
  if (v === 27n || v === 28n) {
    recovery = Number(v - 27n);
  } else if (v >= 35n) {
    chainId = (v - 35n) / 2n;
    recovery = Number((v - 35n) % 2n);
  } else {
    throw new InvalidDataEncodingError('Transaction has an invalid v value', { v: v.toString() });
  }
  if (chainId !== undefined && chainId > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new UnsupportedChainError('Transaction chainId exceeds the safe integer range', {
      chainId: chainId.toString(),
    });
  }

  const payload: RlpItem[] = items.slice(0, 6);
  if (chainId !== undefined) {
    payload.push(encodeRlpInteger(chainId), EMPTY, EMPTY);
  }
  const hash = keccak_256(encodeRlp(payload));
  const publicKey = recoverSecp256k1PublicKey(hash, { r, s, recovery }, false);

  return {
    address: ethAddressFromPublicKey(publicKey),
    publicKey: `0x${bytesToHex(publicKey)}`,
    chainId: chainId === undefined ? undefined : Number(chainId),
    recovery,
  };
}
