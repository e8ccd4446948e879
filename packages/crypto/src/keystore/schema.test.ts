import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { isWalletCoreError, KeystoreParseError, UnsupportedKdfError } from '../errors';
import { parseKeystore } from './schema';

interface FixtureKeystore {
  version: number;
  id?: string;
  address?: string;
  crypto: {
    cipher: string;
    cipherparams: { iv: string };
    ciphertext: string;
    kdf: string;
    kdfparams: Record<string, unknown>;
    mac?: string;
  };
}

function loadFixture(): FixtureKeystore {
  return JSON.parse(readFileSync(new URL('../../test/fixtures/keystore-scrypt-light.json', import.meta.url), 'utf8'));
}

function parseErrorField(input: unknown): string {
  try {
    parseKeystore(input);
  } catch (error) {
    if (error instanceof KeystoreParseError) {
      return error.field;
    }
    throw error;
  }
  throw new Error('expected a KeystoreParseError');
}

describe('parseKeystore', () => {
  it('should parse a scrypt keystore', () => {
    const keystore = parseKeystore(JSON.stringify(loadFixture()));
    expect(keystore.version).toBe(3);
    expect(keystore.address).toBe('b73f8cc7b63c5ed98d6f7c7ba59c8094972b1166');
    expect(keystore.crypto.kdf).toBe('scrypt');
    expect(keystore.crypto.kdfparams).toEqual({
      dklen: 32,
      n: 1024,
      p: 1,
      r: 8,
      salt: '000102030405060708090a0b0c0d0e0f101112131415161718191a1b1c1d1e1f',
    });
  });

  it('should normalise hex fields', () => {
    const fixture = loadFixture();
    fixture.crypto.cipherparams.iv = '0x101112131415161718191A1B1C1D1E1F';
    expect(parseKeystore(fixture).crypto.cipherparams.iv).toBe('101112131415161718191a1b1c1d1e1f');
  });

  it('should accept Crypto as an alias of crypto', () => {
    const { crypto, ...rest } = loadFixture();
    expect(parseKeystore({ ...rest, Crypto: crypto }).crypto.kdf).toBe('scrypt');
  });

  it('should default the pbkdf2 prf to hmac-sha256', () => {
    const fixture = loadFixture();
    fixture.crypto.kdf = 'pbkdf2';
    fixture.crypto.kdfparams = { c: 4096, dklen: 32, salt: '00ff' };
    const keystore = parseKeystore(fixture);
    expect(keystore.crypto.kdf === 'pbkdf2' && keystore.crypto.kdfparams.prf).toBe('hmac-sha256');
  });

  it('should name the missing or malformed field', () => {
    const missingMac = loadFixture();
    delete missingMac.crypto.mac;
    expect(parseErrorField(missingMac)).toBe('mac');

    const shortIv = loadFixture();
    shortIv.crypto.cipherparams.iv = '0011';
    expect(parseErrorField(shortIv)).toBe('iv');

    const badCiphertext = loadFixture();
    badCiphertext.crypto.ciphertext = 'xyz';
    expect(parseErrorField(badCiphertext)).toBe('ciphertext');

    const badN = loadFixture();
    badN.crypto.kdfparams.n = 1000;
    expect(parseErrorField(badN)).toBe('n');

    const missingSalt = loadFixture();
    delete missingSalt.crypto.kdfparams.salt;
    expect(parseErrorField(missingSalt)).toBe('salt');

    const shortKey = loadFixture();
    shortKey.crypto.kdfparams.dklen = 16;
    expect(parseErrorField(shortKey)).toBe('dklen');

    const version = loadFixture();
    version.version = 1;
    expect(parseErrorField(version)).toBe('version');

    const { crypto: _crypto, ...noCrypto } = loadFixture();
    expect(parseErrorField(noCrypto)).toBe('crypto');
  });

  it('should reject text that is not a JSON object', () => {
    expect(parseErrorField('{not json')).toBe('json');
    expect(parseErrorField('[]')).toBe('json');
  });

  it('should reject unknown KDFs and excessive costs', () => {
    const unknown = loadFixture();
    unknown.crypto.kdf = 'argon2id';
    expect(() => parseKeystore(unknown)).toThrow('Unsupported kdf: argon2id');

    try {
      parseKeystore(loadFixture(), { maxScryptN: 512 });
      expect.unreachable();
    } catch (error) {
      expect(isWalletCoreError(error, 'UNSUPPORTED_KDF')).toBe(true);
    }

    const pbkdf2 = loadFixture();
    pbkdf2.crypto.kdf = 'pbkdf2';
    pbkdf2.crypto.kdfparams = { c: 5000, dklen: 32, prf: 'hmac-sha256', salt: '00' };
    expect(() => parseKeystore(pbkdf2, { maxPbkdf2Iterations: 4096 })).toThrow(
      'pbkdf2 iterations exceed the limit of 4096'
    );
  });

  it('should bound the scrypt working set and parallelism', () => {
    const wideBlocks = loadFixture();
    wideBlocks.crypto.kdfparams.r = 20000;
    expect(() => parseKeystore(wideBlocks)).toThrow('scrypt memory exceeds the limit of 1073741824 bytes');

    const manyLanes = loadFixture();
    manyLanes.crypto.kdfparams.p = 2 ** 30;
    expect(() => parseKeystore(manyLanes)).toThrow('scrypt p exceeds the limit of 16');

    const tight = loadFixture();
    expect(() => parseKeystore(tight, { maxScryptMemory: 128 * 1024 * 4 })).toThrow(UnsupportedKdfError);
    expect(parseKeystore(tight, { maxScryptMemory: 128 * 1024 * 8 }).crypto.kdf).toBe('scrypt');
  });
});
