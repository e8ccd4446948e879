import { assertNever, CHAINS, type Chain } from '../chains';
import type { BitcoinNetwork } from '../config';
import { isWalletCoreError } from '../errors';
import { validateBtcAddress } from './bitcoin';
import { validateEthAddress } from './ethereum';
import { validateSolAddress } from './solana';
import { validateTonAddress } from './ton';

export interface AddressValidationOptions {
  /** Bitcoin network to accept; both networks are accepted when omitted. */
  bitcoinNetwork?: BitcoinNetwork;
}

/**
 * Throws InvalidAddressFormatError when `address` is not a well-formed
 * address for `chain`.
 */
export function validateAddress(chain: Chain, address: string, options: AddressValidationOptions = {}): void {
  switch (chain) {
    case 'ethereum':
      validateEthAddress(address);
      return;
    case 'bitcoin':
      if (options.bitcoinNetwork) {
        validateBtcAddress(address, options.bitcoinNetwork);
        return;
      }
      try {
        validateBtcAddress(address, 'mainnet');
      } catch (error) {
        if (!isWalletCoreError(error, 'INVALID_ADDRESS_FORMAT')) {
          throw error;
        }
        validateBtcAddress(address, 'testnet');
      }
      return;
    case 'solana':
      validateSolAddress(address);
      return;
    case 'ton':
      validateTonAddress(address);
      return;
    default:
      assertNever(chain);
  }
}

export function isValidAddress(chain: Chain, address: string, options: AddressValidationOptions = {}): boolean {
  try {
    validateAddress(chain, address, options);
    return true;
  } catch (error) {
    if (isWalletCoreError(error, 'INVALID_ADDRESS_FORMAT')) {
      return false;
    }
    throw error;
  }
}

/** The first chain whose address format accepts `address`. */
export function detectChain(address: string): Chain | undefined {
  return CHAINS.find((chain) => isValidAddress(chain, address));
}
