export type WalletCoreErrorCode =
  | 'INVALID_KEY_ENCODING'
  | 'INVALID_DERIVATION_PATH'
  | 'INVALID_SEED'
  | 'UNSUPPORTED_KDF'
  | 'UNSUPPORTED_CIPHER'
  | 'KEYSTORE_PARSE_ERROR'
  | 'MAC_VERIFICATION_FAILED'
  | 'DECRYPTION_FAILED'
  | 'INVALID_AMOUNT_FORMAT'
  | 'INVALID_ADDRESS_FORMAT'
  | 'INVALID_DATA_ENCODING'
  | 'UNSUPPORTED_CHAIN'
  | 'SIGNATURE_FAILURE';

/**
 * Base class for every failure raised by the wallet core.
 * Messages and details never carry key material, passwords or seeds.
 */
export class WalletCoreError extends Error {
  readonly code: WalletCoreErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: WalletCoreErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
  }
}

export class InvalidKeyEncodingError extends WalletCoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_KEY_ENCODING', message, details);
  }
}

export class InvalidDerivationPathError extends WalletCoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_DERIVATION_PATH', message, details);
  }
}

export class InvalidSeedError extends WalletCoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_SEED', message, details);
  }
}

export class UnsupportedKdfError extends WalletCoreError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super('UNSUPPORTED_KDF', message, details, options);
  }
}

export class UnsupportedCipherError extends WalletCoreError {
  constructor(cipher: string) {
    super('UNSUPPORTED_CIPHER', `Unsupported cipher: ${cipher}`, { cipher });
  }
}

export class KeystoreParseError extends WalletCoreError {
  readonly field: string;

  constructor(field: string, message: string = `Missing or invalid '${field}' field`) {
    super('KEYSTORE_PARSE_ERROR', message, { field });
    this.field = field;
  }
}

export class MacVerificationFailedError extends WalletCoreError {
  constructor() {
    super('MAC_VERIFICATION_FAILED', 'MAC verification failed');
  }
}

export class DecryptionFailedError extends WalletCoreError {
  constructor(options?: { cause?: unknown }) {
    super('DECRYPTION_FAILED', 'Decryption failed - incorrect password or corrupted data', undefined, options);
  }
}

export class InvalidAmountFormatError extends WalletCoreError {
  constructor(field: string, message: string = `Invalid ${field}`) {
    super('INVALID_AMOUNT_FORMAT', message, { field });
  }
}

export class InvalidAddressFormatError extends WalletCoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_ADDRESS_FORMAT', message, details);
  }
}

export class InvalidDataEncodingError extends WalletCoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_DATA_ENCODING', message, details);
  }
}

export class UnsupportedChainError extends WalletCoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('UNSUPPORTED_CHAIN', message, details);
  }
}

export class SignatureFailureError extends WalletCoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SIGNATURE_FAILURE', message, undefined, options);
  }
}

export function isWalletCoreError(value: unknown, code?: WalletCoreErrorCode): value is WalletCoreError {
  return value instanceof WalletCoreError && (code === undefined || value.code === code);
}
