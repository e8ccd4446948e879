export {
  assertSupportedCipher,
  computeKeystoreMac,
  decryptKeystoreCiphertext,
  SUPPORTED_CIPHER,
  verifyKeystoreMac,
} from './cipher';
export { deriveKeystoreKey, scryptKey } from './kdf';
export { decryptKeystore, encryptKeystore } from './keystore';
export type { EncryptKeystoreOptions } from './keystore';
export { assertScryptCost, parseKdfParams, parseKeystore, SUPPORTED_KDFS } from './schema';
export type { KdfName, Keystore, KeystoreCrypto, KeystoreKdf, Pbkdf2Params, ScryptParams } from './schema';
