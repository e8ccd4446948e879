export function getWebCrypto(): Crypto {
  const cryptoObj = typeof globalThis !== 'undefined' ? (globalThis as { crypto?: Crypto }).crypto : undefined;

  if (cryptoObj && typeof cryptoObj.getRandomValues === 'function' && cryptoObj.subtle) {
    return cryptoObj;
  }

  throw new Error('Web Crypto API is unavailable. Provide a polyfill exposing globalThis.crypto.');
}

export function randomBytes(length: number) {
  const bytes = new Uint8Array(length);
  getWebCrypto().getRandomValues(bytes);
  return bytes;
}
