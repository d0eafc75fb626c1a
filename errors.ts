export type TranslationErrorKind =
  | 'rate_limited'
  | 'auth'
  | 'transient_network'
  | 'unsupported_language'
  | 'rejected'
  | 'timeout';

const RETRYABLE_KINDS: ReadonlySet<TranslationErrorKind> = new Set(['rate_limited', 'transient_network']);

export class TranslationError extends Error {
  kind: TranslationErrorKind;
  retryable: boolean;
  status?: number;

  constructor(kind: TranslationErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TranslationError';
    this.kind = kind;
    this.retryable = RETRYABLE_KINDS.has(kind);
    this.status = options.status;
  }
}

export class FetchError extends Error {
  url: string;
  status?: number;

  constructor(url: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.url = url;
    this.status = options.status;
  }
}

export class ExtractionError extends Error {
  url: string;

  constructor(url: string, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ExtractionError';
    this.url = url;
  }
}

export class CacheUnavailable extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'CacheUnavailable';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Aborts the whole run: nothing after an auth failure can succeed. */
export class FatalRunError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'FatalRunError';
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: TranslationError };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const fail = <T>(error: TranslationError): Result<T> => ({ ok: false, error });

export const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));
