import { z } from 'zod';
import { isHexString, stripHexPrefix } from '@seedvault/helpers';

import { resolveConfig, type CryptoConfig } from '../config';
import { KeystoreParseError, UnsupportedKdfError } from '../errors';

export const SUPPORTED_KDFS = ['scrypt', 'pbkdf2'] as const;
export type KdfName = (typeof SUPPORTED_KDFS)[number];

const hex = (options: { bytes?: number; minBytes?: number } = {}) =>
  z
    .string()
    .transform((value) => stripHexPrefix(value).toLowerCase())
    .refine((value) => isHexString(value), { message: 'Expected a hex string' })
    .refine((value) => options.bytes === undefined || value.length === options.bytes * 2, {
      message: `Expected ${options.bytes} bytes`,
    })
    .refine((value) => options.minBytes === undefined || value.length >= options.minBytes * 2, {
      message: `Expected at least ${options.minBytes} bytes`,
    });

const positiveInt = z.number().int().positive();
const dklen = z.number().int().min(32).max(64);

const cryptoSectionSchema = z.object({
  cipher: z.string(),
  cipherparams: z.object({ iv: hex({ bytes: 16 }) }),
  ciphertext: hex({ minBytes: 1 }),
  kdf: z.string(),
  kdfparams: z.record(z.unknown()),
  mac: hex({ minBytes: 16 }),
});

const keystoreSchema = z.object({
  version: z.literal(3),
  id: z.string().optional(),
  address: z.string().optional(),
  crypto: cryptoSectionSchema,
});

const scryptParamsSchema = z.object({
  dklen,
  n: positiveInt.refine((n) => n > 1 && (n & (n - 1)) === 0, { message: 'n must be a power of two' }),
  p: positiveInt,
  r: positiveInt,
  salt: hex(),
});

const pbkdf2ParamsSchema = z.object({
  c: positiveInt,
  dklen,
  prf: z.string().default('hmac-sha256'),
  salt: hex(),
});

export type ScryptParams = z.infer<typeof scryptParamsSchema>;
export type Pbkdf2Params = z.infer<typeof pbkdf2ParamsSchema>;

export type KeystoreKdf = { kdf: 'scrypt'; kdfparams: ScryptParams } | { kdf: 'pbkdf2'; kdfparams: Pbkdf2Params };

export type KeystoreCrypto = {
  cipher: string;
  cipherparams: { iv: string };
  ciphertext: string;
  mac: string;
} & KeystoreKdf;

/** Web3 Secret Storage V3 document with hex fields normalised to lowercase without `0x`. */
export interface Keystore {
  version: 3;
  id?: string;
  address?: string;
  crypto: KeystoreCrypto;
}

function fieldOf(error: z.ZodError, fallback: string): KeystoreParseError {
  const issue = error.issues[0];
  const last = issue?.path[issue.path.length - 1];
  const field = last === undefined ? fallback : String(last);
  return new KeystoreParseError(field, `Missing or invalid '${field}' field: ${issue?.message ?? 'invalid'}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reject scrypt parameters whose memory or parallelism exceeds the configured
 * limits. Memory is `128 * n * r` bytes per lane.
 */
export function assertScryptCost(
  params: { n: number; r: number; p: number },
  config: CryptoConfig = {}
): void {
  const limits = resolveConfig(config);
  const { n, r, p } = params;
  if (n > limits.maxScryptN) {
    throw new UnsupportedKdfError(`scrypt n exceeds the limit of ${limits.maxScryptN}`, { kdf: 'scrypt', n });
  }
  if (128 * n * r > limits.maxScryptMemory) {
    throw new UnsupportedKdfError(`scrypt memory exceeds the limit of ${limits.maxScryptMemory} bytes`, {
      kdf: 'scrypt',
      n,
      r,
    });
  }
  if (p > limits.maxScryptParallelism) {
    throw new UnsupportedKdfError(`scrypt p exceeds the limit of ${limits.maxScryptParallelism}`, {
      kdf: 'scrypt',
      p,
    });
  }
}

/**
 * Validate KDF parameters and enforce the configured cost limits.
 */
export function parseKdfParams(kdf: string, kdfparams: unknown, config: CryptoConfig = {}): KeystoreKdf {
  const limits = resolveConfig(config);

  switch (kdf) {
    case 'scrypt': {
      const params = scryptParamsSchema.safeParse(kdfparams);
      if (!params.success) {
        throw fieldOf(params.error, 'kdfparams');
      }
      assertScryptCost(params.data, limits);
      return { kdf, kdfparams: params.data };
    }
    case 'pbkdf2': {
      const params = pbkdf2ParamsSchema.safeParse(kdfparams);
      if (!params.success) {
        throw fieldOf(params.error, 'kdfparams');
      }
      if (params.data.c > limits.maxPbkdf2Iterations) {
        throw new UnsupportedKdfError(`pbkdf2 iterations exceed the limit of ${limits.maxPbkdf2Iterations}`, {
          kdf,
          c: params.data.c,
        });
      }
      return { kdf, kdfparams: params.data };
    }
    default:
      throw new UnsupportedKdfError(`Unsupported kdf: ${kdf}`, { kdf });
  }
}

/**
 * Parse and validate a keystore document. Accepts JSON text or an already
 * parsed object; `Crypto` is accepted as an alias of `crypto`.
 */
export function parseKeystore(input: unknown, config: CryptoConfig = {}): Keystore {
  let raw: unknown = input;
  if (typeof input === 'string') {
    try {
      raw = JSON.parse(input);
    } catch {
      throw new KeystoreParseError('json', 'Keystore is not valid JSON');
    }
  }
  if (!isRecord(raw)) {
    throw new KeystoreParseError('json', 'Keystore must be a JSON object');
  }
  if (raw.crypto === undefined && raw.Crypto !== undefined) {
    raw = { ...raw, crypto: raw.Crypto };
  }

  const envelope = keystoreSchema.safeParse(raw);
  if (!envelope.success) {
    throw fieldOf(envelope.error, 'crypto');
  }
  const { kdf, kdfparams, ...section } = envelope.data.crypto;
  const parsedKdf = parseKdfParams(kdf, kdfparams, config);

  return {
    version: envelope.data.version,
    id: envelope.data.id,
    address: envelope.data.address,
    crypto: { ...section, ...parsedKdf },
  };
}
