/**
 * Filename is empty or nothing usable survives filtering.
 */
export class InputError extends Error {
  readonly filename: string;

  constructor(message: string, filename: string) {
    super(message);
    this.name = 'InputError';
    this.filename = filename;
  }
}

export type ProviderErrorKind = 'network' | 'timeout' | 'auth' | 'rate-limit' | 'http' | 'parse';

/**
 * Failure talking to the metadata provider. Never fatal: the resolution engine
 * moves on to its next strategy.
 */
export class ProviderError extends Error {
  readonly kind: ProviderErrorKind;
  readonly status?: number;

  constructor(kind: ProviderErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'ProviderError';
    this.kind = kind;
    this.status = status;
  }
}

export class CacheError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CacheError';
  }
}

/**
 * Malformed vocabulary or settings. The only error class that aborts startup.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
