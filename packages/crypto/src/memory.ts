/**
 * Helpers for keeping secret bytes short-lived.
 */
export class SecureMemory {
  /**
   * Overwrite every given buffer with zeros. Undefined entries are skipped so
   * callers can pass buffers that were never assigned on an early exit.
   */
  static zeroize(...arrays: Array<Uint8Array | undefined>): void {
    for (const array of arrays) {
      array?.fill(0);
    }
  }

  /**
   * Run `fn` with `secret` and zero the buffer afterwards, whether `fn`
   * returns or throws.
   */
  static use<T>(secret: Uint8Array, fn: (secret: Uint8Array) => T): T {
    try {
      return fn(secret);
    } finally {
      secret.fill(0);
    }
  }

  /** Async counterpart of {@link SecureMemory.use}. */
  static async useAsync<T>(secret: Uint8Array, fn: (secret: Uint8Array) => Promise<T>): Promise<T> {
    try {
      return await fn(secret);
    } finally {
      secret.fill(0);
    }
  }

  /**
   * Compare two Uint8Arrays in constant time to prevent timing attacks
   */
  static constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length !== b.length) {
      return false;
    }

    let result = 0;
    for (let i = 0; i < a.length; i++) {
      result |= a[i] ^ b[i];
    }

    return result === 0;
  }
}
