export * from './address';
export { assertNever, chainCurve, CHAINS, isChain } from './chains';
export type { Chain, Curve } from './chains';
export { DEFAULT_CONFIG, resolveConfig } from './config';
export type { BitcoinNetwork, CryptoConfig, ResolvedCryptoConfig, TonWorkchain } from './config';
export * from './derivation';
export { EncryptionService } from './encryption';
export type { EncryptedData, EncryptionOptions, ScryptCost } from './encryption';
export {
  DecryptionFailedError,
  InvalidAddressFormatError,
  InvalidAmountFormatError,
  InvalidDataEncodingError,
  InvalidDerivationPathError,
  InvalidKeyEncodingError,
  InvalidSeedError,
  isWalletCoreError,
  KeystoreParseError,
  MacVerificationFailedError,
  SignatureFailureError,
  UnsupportedChainError,
  UnsupportedCipherError,
  UnsupportedKdfError,
  WalletCoreError,
} from './errors';
export type { WalletCoreErrorCode } from './errors';
export { addressFromPrivateKey, ed25519PublicKeyHex, KeyDeriver } from './hdwallet';
export { parsePrivateKey } from './keys';
export * from './keystore';
export { createConsoleLogger, NOOP_LOGGER } from './logger';
export type { CryptoLogger } from './logger';
export { SecureMemory } from './memory';
export { decodeRlp, decodeRlpInteger, encodeRlp, encodeRlpInteger, isRlpList } from './rlp';
export type { RlpItem } from './rlp';
export * from './signers';
