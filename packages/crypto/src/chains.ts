import { UnsupportedChainError } from './errors';

export const CHAINS = ['ethereum', 'bitcoin', 'solana', 'ton'] as const;

export type Chain = (typeof CHAINS)[number];

export type Curve = 'secp256k1' | 'ed25519';

export function isChain(value: string): value is Chain {
  return (CHAINS as readonly string[]).includes(value);
}

export function assertNever(value: never): never {
  throw new UnsupportedChainError(`Unsupported chain: ${String(value)}`, { chain: String(value) });
}

export function chainCurve(chain: Chain): Curve {
  switch (chain) {
    case 'ethereum':
    case 'bitcoin':
      return 'secp256k1';
    case 'solana':
    case 'ton':
      return 'ed25519';
    default:
      return assertNever(chain);
  }
}

/**
 * Fixed derivation path for each chain. Ed25519 chains are hardened at every
 * level, including the account index.
 */
export function chainDerivationPath(chain: Chain, index: number): string {
  switch (chain) {
    case 'ethereum':
      return `m/44'/60'/0'/0/${index}`;
    case 'bitcoin':
      return `m/84'/0'/0'/0/${index}`;
    case 'solana':
      return `m/44'/501'/0'/${index}'`;
    case 'ton':
      return `m/44'/607'/0'/0'/0'/${index}'`;
    default:
      return assertNever(chain);
  }
}
