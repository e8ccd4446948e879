import { base58 } from '@scure/base';

import { InvalidAddressFormatError } from '../errors';
import { ed25519PublicKey, parsePrivateKey } from '../keys';

export function solAddressFromPublicKey(publicKey: Uint8Array): string {
  if (publicKey.length !== 32) {
    throw new InvalidAddressFormatError('Expected a 32-byte Ed25519 public key');
  }
  return base58.encode(publicKey);
}

export function solAddressFromPrivateKey(privateKeyHex: string): string {
  const key = parsePrivateKey(privateKeyHex, 'ed25519');
  try {
    return solAddressFromPublicKey(ed25519PublicKey(key));
  } finally {
    key.fill(0);
  }
}

export function decodeSolAddress(address: string): Uint8Array {
  let bytes: Uint8Array;
  try {
    bytes = base58.decode(address);
  } catch (error) {
    throw new InvalidAddressFormatError('Solana address is not valid Base58', { address, reason: String(error) });
  }
  if (bytes.length !== 32) {
    throw new InvalidAddressFormatError('Solana address must decode to 32 bytes', { address, length: bytes.length });
  }
  return bytes;
}

export function validateSolAddress(address: string): void {
  decodeSolAddress(address);
}
