/**
 * Error taxonomy for the downloader. Exchange sources throw the fetch errors;
 * the engine turns them into job outcomes and never lets them reach siblings.
 */

export abstract class FetchError extends Error {
  abstract readonly retriable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure, timeout, rate limiting or a 5xx: retried with backoff */
export class TransientFetchError extends FetchError {
  readonly retriable = true;
  /** Server-requested wait before the next attempt (Retry-After) */
  readonly retryAfterMs: number | undefined;

  constructor(message: string, options?: { cause?: unknown; retryAfterMs?: number }) {
    super(message, options);
    this.retryAfterMs = options?.retryAfterMs;
  }
}

/** Unknown pair, rejected credentials, unusable response: the job is aborted */
export class PermanentFetchError extends FetchError {
  readonly retriable = false;
}

/** The trailing row of an existing output file cannot be read as a candle */
export class CorruptResumeStateError extends Error {
  constructor(
    readonly outputPath: string,
    readonly line: string,
    reason: string,
  ) {
    super(`Corrupt resume state in ${outputPath}: ${reason}`);
    this.name = 'CorruptResumeStateError';
  }
}

/** Invalid configuration; raised before any job starts */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
