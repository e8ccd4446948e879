export {
  bytesEqual,
  bytesToHex,
  concatBytes,
  copyBytes,
  hexToBytes,
  isHexString,
  stripHexPrefix,
  utf8ToBytes,
} from './encoding';
export {
  bigintToBytes,
  bigintToFixedBytes,
  bytesToBigint,
  fitsUnsigned,
  parseUnsignedDecimal,
  writeUint32BE,
} from './integers';
export { getWebCrypto, randomBytes } from './webcrypto';
