import { InvalidDerivationPathError } from '../errors';

export const HARDENED_OFFSET = 0x80000000;

export interface PathComponent {
  /** Index below 2^31; the hardened offset is not included. */
  index: number;
  hardened: boolean;
}

const SEGMENT_PATTERN = /^(0|[1-9][0-9]*)(['hH])?$/;

export function isValidIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < HARDENED_OFFSET;
}

export function assertValidIndex(index: number): void {
  if (!isValidIndex(index)) {
    throw new InvalidDerivationPathError('Account index must be an integer in [0, 2^31)', { index });
  }
}

/**
 * Parse BIP32 notation such as `m/44'/60'/0'/0/5`. Both `'` and `h` mark a
 * hardened component.
 */
export function parseDerivationPath(path: string): PathComponent[] {
  const segments = path.split('/');
  if (segments[0] !== 'm') {
    throw new InvalidDerivationPathError('Derivation path must start with "m"', { path });
  }

  return segments.slice(1).map((segment, position) => {
    const match = SEGMENT_PATTERN.exec(segment);
    if (!match) {
      throw new InvalidDerivationPathError(`Invalid path component "${segment}"`, { path, position });
    }
    const index = Number(match[1]);
    if (!isValidIndex(index)) {
      throw new InvalidDerivationPathError(`Path component "${segment}" is out of range`, { path, position });
    }
    return { index, hardened: match[2] !== undefined };
  });
}

export function formatDerivationPath(components: readonly PathComponent[]): string {
  return ['m', ...components.map((c) => (c.hardened ? `${c.index}'` : `${c.index}`))].join('/');
}

export function isValidDerivationPath(path: string): boolean {
  try {
    parseDerivationPath(path);
    return true;
  } catch {
    return false;
  }
}
