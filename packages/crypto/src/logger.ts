export interface CryptoLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

const noop = (): void => undefined;

export const NOOP_LOGGER: CryptoLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export function createConsoleLogger(prefix = 'SeedVault'): CryptoLogger {
  return {
    debug: (message, meta) => console.debug(`[${prefix}] ${message}`, meta ?? ''),
    info: (message, meta) => console.info(`[${prefix}] ${message}`, meta ?? ''),
    warn: (message, meta) => console.warn(`[${prefix}] ${message}`, meta ?? ''),
    error: (message, meta) => console.error(`[${prefix}] ${message}`, meta ?? ''),
  };
}
