import { describe, it, expect, vi } from 'vitest';
import { mnemonicToSeedSync } from '@scure/bip39';
import { isWalletCoreError } from './errors';
import { addressFromPrivateKey, ed25519PublicKeyHex, KeyDeriver } from './hdwallet';
import type { CryptoLogger } from './logger';

/**
 * Pinned vectors. If these change, existing wallets derive different
 * addresses and users lose access to funds.
 */
const ZERO_SEED = new Uint8Array(64);

const ZERO_SEED_VECTORS = {
  eth: [
    {
      privateKey: '761a3d94f077cebbbfb18e5e440049bb64530b0418888e4cdaa680fd7c4abe6a',
      address: '0xb73f8cc7b63c5ed98d6f7c7ba59c8094972b1166',
      checksummed: '0xb73F8Cc7b63C5Ed98d6F7C7ba59C8094972B1166',
    },
    {
      privateKey: 'df9e20233f36fb0b68edbb556a7af779c7d1706e10773950ebb23795c366a9ef',
      address: '0x202968e49c2c038470ed6988e577fa5225fb4ada',
      checksummed: '0x202968E49C2C038470ED6988E577Fa5225Fb4ada',
    },
  ],
  btc: {
    privateKey: '13f2a9a416a4cf5dd3eab5261c4e84646b70974b6d64c1b00d511888fcf7a1e1',
    address: 'bc1qenqxln48rmf3rj2yz33cn3gh0pf5czh4nk86ul',
    testnetAddress: 'tb1qenqxln48rmf3rj2yz33cn3gh0pf5czh4esuf8v',
  },
  sol: [
    {
      privateKey: '7d184306a8452a59ec35de35de703658252743e31f8aaa5491d8b08c1c8f1904',
      publicKey: '8f009f298a07e1f832ba20082570a0ea7c59b19ec7d2b514cc29a6694b333ba6',
      address: 'AdDrLYramWa5Eoy5FYU6KyoxG6Nu1sL6XVacPmsF4heD',
    },
    {
      privateKey: '00020f42befe2e936b6c01cc96e0fff84becaf3db59fcf2be2ba4d64d074d7c8',
      address: '774RtfRYmTePyrvj3Bp1mHd9BhNVzUhE7uG2iMVQ2dmQ',
    },
  ],
  ton: {
    privateKey: 'e4eb84c208bf3f47d481a7097e8bd88b61d1422321a29ecea4b88d7dd3d366a4',
    publicKey: '45d816d76530710bb5f7124bf2814f951bc2c169a0c249a7d43ec1a40395fe69',
    address: '0:4e5c86a6893d38a7893f182f380e24e75a6fd7c42a7e601d2f2f76ca35d6c6ff',
  },
};

const TEST_MNEMONIC =
  'abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon about';

function expectCode(fn: () => unknown, code: string): void {
  try {
    fn();
  } catch (error) {
    expect(isWalletCoreError(error) && error.code).toBe(code);
    return;
  }
  expect.unreachable(`expected ${code}`);
}

describe('KeyDeriver', () => {
  describe('all-zero seed', () => {
    const deriver = new KeyDeriver(ZERO_SEED);

    it('should derive the pinned Ethereum keys and addresses', () => {
      ZERO_SEED_VECTORS.eth.forEach((vector, index) => {
        const privateKey = deriver.deriveEthPrivateKey(index);
        expect(privateKey).toBe(vector.privateKey);
        expect(deriver.getEthAddress(privateKey)).toBe(vector.address);
      });
    });

    it('should derive the pinned Bitcoin key and address', () => {
      const privateKey = deriver.deriveBtcPrivateKey(0);
      expect(privateKey).toBe(ZERO_SEED_VECTORS.btc.privateKey);
      expect(deriver.getBtcAddress(privateKey)).toBe(ZERO_SEED_VECTORS.btc.address);
    });

    it('should derive the pinned Solana keys and addresses', () => {
      ZERO_SEED_VECTORS.sol.forEach((vector, index) => {
        const privateKey = deriver.deriveSolPrivateKey(index);
        expect(privateKey).toBe(vector.privateKey);
        expect(deriver.getSolAddress(privateKey)).toBe(vector.address);
      });
      expect(deriver.getSolPublicKey(ZERO_SEED_VECTORS.sol[0].privateKey)).toBe(ZERO_SEED_VECTORS.sol[0].publicKey);
    });

    it('should derive the pinned TON key, public key and raw address', () => {
      const privateKey = deriver.deriveTonPrivateKey(0);
      expect(privateKey).toBe(ZERO_SEED_VECTORS.ton.privateKey);
      expect(deriver.getTonPublicKey(privateKey)).toBe(ZERO_SEED_VECTORS.ton.publicKey);
      expect(deriver.getTonAddress(privateKey)).toBe(ZERO_SEED_VECTORS.ton.address);
    });

    it('should dispatch by chain', () => {
      expect(deriver.derivePrivateKey('ethereum', 1)).toBe(ZERO_SEED_VECTORS.eth[1].privateKey);
      expect(deriver.getAddress('solana', ZERO_SEED_VECTORS.sol[1].privateKey)).toBe(ZERO_SEED_VECTORS.sol[1].address);
      expect(deriver.getAddress('ton', ZERO_SEED_VECTORS.ton.privateKey)).toBe(ZERO_SEED_VECTORS.ton.address);
    });

    it('should derive along an explicit path', () => {
      expect(deriver.derivePrivateKeyAtPath('secp256k1', "m/44'/60'/0'/0/0")).toBe(ZERO_SEED_VECTORS.eth[0].privateKey);
      expect(deriver.derivePrivateKeyAtPath('ed25519', "m/44h/501h/0h/0h")).toBe(ZERO_SEED_VECTORS.sol[0].privateKey);
    });

    it('should be deterministic across instances', () => {
      const other = new KeyDeriver(ZERO_SEED);
      expect(other.deriveTonPrivateKey(3)).toBe(deriver.deriveTonPrivateKey(3));
      expect(other.deriveBtcPrivateKey(5)).toBe(deriver.deriveBtcPrivateKey(5));
    });

    it('should derive distinct keys for distinct indices', () => {
      const keys = new Set([0, 1, 2, 3].map((index) => deriver.deriveSolPrivateKey(index)));
      expect(keys.size).toBe(4);
    });
  });

  describe('standard test mnemonic', () => {
    const deriver = new KeyDeriver(mnemonicToSeedSync(TEST_MNEMONIC), { checksumEthAddresses: true });

    it('should match widely published first addresses', () => {
      expect(deriver.getEthAddress(deriver.deriveEthPrivateKey(0))).toBe('0x9858EfFD232B4033E47d90003D41EC34EcaEda94');
      expect(deriver.getBtcAddress(deriver.deriveBtcPrivateKey(0))).toBe('bc1qcr8te4kr609gcawutmrza0j4xv80jy8z306fyu');
      expect(deriver.getSolAddress(deriver.deriveSolPrivateKey(0))).toBe('HAgk14JpMQLgt6rVgv7cBQFJWFto5Dqxi472uT3DKpqk');
    });
  });

  describe('configuration', () => {
    it('should return EIP-55 addresses when configured', () => {
      const deriver = new KeyDeriver(ZERO_SEED, { checksumEthAddresses: true });
      expect(deriver.getEthAddress(ZERO_SEED_VECTORS.eth[1].privateKey)).toBe(ZERO_SEED_VECTORS.eth[1].checksummed);
    });

    it('should use the testnet HRP when configured', () => {
      const deriver = new KeyDeriver(ZERO_SEED, { bitcoinNetwork: 'testnet' });
      expect(deriver.getBtcAddress(ZERO_SEED_VECTORS.btc.privateKey)).toBe(ZERO_SEED_VECTORS.btc.testnetAddress);
    });

    it('should use the configured TON workchain', () => {
      const deriver = new KeyDeriver(ZERO_SEED, { tonWorkchain: -1 });
      expect(deriver.getTonAddress(ZERO_SEED_VECTORS.ton.privateKey)).toBe(
        '-1:4e5c86a6893d38a7893f182f380e24e75a6fd7c42a7e601d2f2f76ca35d6c6ff'
      );
    });

    it('should log derivations without key material', () => {
      const logger: CryptoLogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const deriver = new KeyDeriver(ZERO_SEED, { logger });
      const privateKey = deriver.deriveEthPrivateKey(2);

      expect(logger.debug).toHaveBeenCalledWith('Deriving private key', {
        chain: 'ethereum',
        index: 2,
        path: "m/44'/60'/0'/0/2",
      });
      expect(JSON.stringify(vi.mocked(logger.debug).mock.calls)).not.toContain(privateKey);
    });
  });

  describe('validation', () => {
    const deriver = new KeyDeriver(ZERO_SEED);

    it('should limit seed length only for BIP32 chains', () => {
      const short = new KeyDeriver(new Uint8Array(8).fill(7));
      const long = new KeyDeriver(new Uint8Array(100).fill(7));
      expectCode(() => short.deriveEthPrivateKey(0), 'INVALID_SEED');
      expectCode(() => long.deriveBtcPrivateKey(0), 'INVALID_SEED');
      expect(short.deriveSolPrivateKey(0)).toBe('e4989125692b80c5ecf3a8e74b911196f80104f34de48a702574f4a9ffbd5f30');
      expect(long.deriveTonPrivateKey(0)).toBe('8259038254b4072b564d76d75915d2af0ee163ea9ea08f1cbfc88349024165a9');
      expect(() => new KeyDeriver(new Uint8Array(16)).deriveEthPrivateKey(0)).not.toThrow();
    });

    it('should reject indices outside [0, 2^31)', () => {
      for (const index of [-1, 2 ** 31, 1.5, Number.NaN]) {
        expectCode(() => deriver.deriveEthPrivateKey(index), 'INVALID_DERIVATION_PATH');
      }
      expect(() => deriver.deriveSolPrivateKey(2 ** 31 - 1)).not.toThrow();
    });

    it('should reject soft paths on ed25519', () => {
      expectCode(() => deriver.derivePrivateKeyAtPath('ed25519', "m/44'/501'/0'/0"), 'INVALID_DERIVATION_PATH');
    });

    it('should reject malformed private keys', () => {
      expectCode(() => deriver.getEthAddress('1234'), 'INVALID_KEY_ENCODING');
      expectCode(() => deriver.getSolAddress('zz'.repeat(32)), 'INVALID_KEY_ENCODING');
      expectCode(() => deriver.getBtcAddress('00'.repeat(32)), 'INVALID_KEY_ENCODING');
      expectCode(
        () => deriver.getEthAddress('fffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141'),
        'INVALID_KEY_ENCODING'
      );
    });

    it('should accept a 0x prefix on private keys', () => {
      expect(deriver.getEthAddress(`0x${ZERO_SEED_VECTORS.eth[0].privateKey}`)).toBe(ZERO_SEED_VECTORS.eth[0].address);
    });
  });

  describe('lifecycle', () => {
    it('should copy the seed on construction', () => {
      const seed = new Uint8Array(64);
      const deriver = new KeyDeriver(seed);
      seed.fill(1);
      expect(deriver.deriveEthPrivateKey(0)).toBe(ZERO_SEED_VECTORS.eth[0].privateKey);
    });

    it('should refuse to derive after dispose', () => {
      const deriver = new KeyDeriver(ZERO_SEED);
      deriver.dispose();
      expect(deriver.isDisposed).toBe(true);
      expectCode(() => deriver.deriveEthPrivateKey(0), 'INVALID_SEED');
      expectCode(() => deriver.clone(), 'INVALID_SEED');
    });

    it('should keep clones independent of the original', () => {
      const original = new KeyDeriver(ZERO_SEED);
      const clone = original.clone();
      original.dispose();
      expect(clone.deriveEthPrivateKey(0)).toBe(ZERO_SEED_VECTORS.eth[0].privateKey);
    });

    it('should dispose after withSeed even when the callback throws', async () => {
      let captured: KeyDeriver | undefined;
      await expect(
        KeyDeriver.withSeed(ZERO_SEED, (deriver) => {
          captured = deriver;
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');
      expect(captured?.isDisposed).toBe(true);
    });

    it('should return the callback result from withSeed', async () => {
      const key = await KeyDeriver.withSeed(ZERO_SEED, (deriver) => deriver.deriveTonPrivateKey(0));
      expect(key).toBe(ZERO_SEED_VECTORS.ton.privateKey);
    });
  });

  describe('static helpers', () => {
    it('should expose the per-chain derivation paths', () => {
      expect(KeyDeriver.derivationPath('ethereum', 5)).toBe("m/44'/60'/0'/0/5");
      expect(KeyDeriver.derivationPath('bitcoin', 0)).toBe("m/84'/0'/0'/0/0");
      expect(KeyDeriver.derivationPath('solana', 2)).toBe("m/44'/501'/0'/2'");
      expect(KeyDeriver.derivationPath('ton', 1)).toBe("m/44'/607'/0'/0'/0'/1'");
    });

    it('should validate path strings', () => {
      expect(KeyDeriver.isValidPath("m/44'/60'/0'/0/0")).toBe(true);
      expect(KeyDeriver.isValidPath('44/60')).toBe(false);
    });
  });

  describe('performance', () => {
    it('should derive a key and address in under 100 ms', () => {
      const deriver = new KeyDeriver(ZERO_SEED);
      deriver.getEthAddress(deriver.deriveEthPrivateKey(0));

      const start = performance.now();
      deriver.getEthAddress(deriver.deriveEthPrivateKey(1));
      deriver.getSolAddress(deriver.deriveSolPrivateKey(1));
      expect(performance.now() - start).toBeLessThan(100);
    });
  });
});

describe('key-only helpers', () => {
  it('should compute addresses without a seed', () => {
    expect(addressFromPrivateKey('ethereum', ZERO_SEED_VECTORS.eth[0].privateKey)).toBe(ZERO_SEED_VECTORS.eth[0].address);
    expect(addressFromPrivateKey('bitcoin', ZERO_SEED_VECTORS.btc.privateKey, { bitcoinNetwork: 'testnet' })).toBe(
      ZERO_SEED_VECTORS.btc.testnetAddress
    );
    expect(ed25519PublicKeyHex(ZERO_SEED_VECTORS.ton.privateKey)).toBe(ZERO_SEED_VECTORS.ton.publicKey);
  });
});
