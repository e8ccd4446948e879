import { describe, it, expect } from 'vitest';
import { SecureMemory } from './memory';

describe('SecureMemory', () => {
  it('should zero every buffer and skip undefined entries', () => {
    const a = new Uint8Array([1, 2, 3]);
    const b = new Uint8Array([4, 5]);
    SecureMemory.zeroize(a, undefined, b);
    expect(Array.from(a)).toEqual([0, 0, 0]);
    expect(Array.from(b)).toEqual([0, 0]);
  });

  it('should zero the secret after use even when the callback throws', () => {
    const secret = new Uint8Array([9, 9]);
    expect(() =>
      SecureMemory.use(secret, () => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(Array.from(secret)).toEqual([0, 0]);
  });

  it('should return the callback result', async () => {
    const secret = new Uint8Array([7]);
    expect(SecureMemory.use(secret, (bytes) => bytes[0] * 2)).toBe(14);
    expect(Array.from(secret)).toEqual([0]);

    const asyncSecret = new Uint8Array([3]);
    await expect(SecureMemory.useAsync(asyncSecret, async (bytes) => bytes[0] + 1)).resolves.toBe(4);
    expect(Array.from(asyncSecret)).toEqual([0]);
  });

  it('should compare in constant time', () => {
    expect(SecureMemory.constantTimeEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true);
    expect(SecureMemory.constantTimeEqual(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(false);
    expect(SecureMemory.constantTimeEqual(new Uint8Array([1]), new Uint8Array([1, 2]))).toBe(false);
  });
});
