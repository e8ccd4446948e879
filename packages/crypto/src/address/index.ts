export {
  BECH32_HRP,
  btcAddressFromPrivateKey,
  btcAddressFromPublicKey,
  decodeSegwitAddress,
  encodeSegwitAddress,
  hash160,
  validateBtcAddress,
} from './bitcoin';
export type { SegwitAddress } from './bitcoin';
export {
  ethAddressFromPrivateKey,
  ethAddressFromPublicKey,
  toChecksumAddress,
  validateEthAddress,
} from './ethereum';
export { decodeSolAddress, solAddressFromPrivateKey, solAddressFromPublicKey, validateSolAddress } from './solana';
export {
  crc16,
  decodeTonFriendlyAddress,
  encodeTonFriendlyAddress,
  parseRawTonAddress,
  tonAddressFromPrivateKey,
  tonAddressFromPublicKey,
  validateTonAddress,
} from './ton';
export type { DecodedTonFriendlyAddress, TonAddressParts, TonFriendlyOptions } from './ton';
export { detectChain, isValidAddress, validateAddress } from './validate';
export type { AddressValidationOptions } from './validate';
