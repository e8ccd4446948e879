export { deriveBip32PrivateKey, MAX_SEED_LENGTH, MIN_SEED_LENGTH } from './bip32';
export {
  assertValidIndex,
  formatDerivationPath,
  HARDENED_OFFSET,
  isValidDerivationPath,
  isValidIndex,
  parseDerivationPath,
} from './path';
export type { PathComponent } from './path';
export { deriveSlip10PrivateKey } from './slip10';
