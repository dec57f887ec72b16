import { request as undiciRequest, type Dispatcher } from 'undici';
import type { z } from 'zod';
import { createChildLogger } from '../../logger.js';
import { settings } from '../../config.js';
import { PermanentFetchError, TransientFetchError, errorMessage } from '../../errors.js';
import { apiErrorSchema } from './schemas.js';

const log = createChildLogger('binance-client');

const RAW_PREVIEW_CHARS = 500;

export interface BinanceClientOptions {
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
  /** undici dispatcher; tests pass a MockAgent */
  readonly dispatcher?: Dispatcher;
}

function isRateLimitStatus(status: number): boolean {
  return status === 429 || status === 418;
}

function isAuthError(status: number): boolean {
  return status === 401 || status === 403;
}

function retryAfterMs(headers: Dispatcher.ResponseData['headers']): number | undefined {
  const value = headers['retry-after'];
  const first = Array.isArray(value) ? value[0] : value;
  if (first === undefined) return undefined;
  const seconds = Number(first);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Public GET client. It does not retry: failures are classified into
 * transient (network, timeout, 429/418, 5xx) and permanent (auth, other 4xx,
 * unexpected shape) and the caller owns the retry policy.
 */
export class BinanceClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(options: BinanceClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? settings.binance.restBaseUrl;
    this.timeoutMs = options.timeoutMs ?? settings.http.requestTimeoutMs;
    this.dispatcher = options.dispatcher;
  }

  async requestPublic(path: string, query: Record<string, string> = {}): Promise<unknown> {
    const url = new URL(path, this.baseUrl);
    Object.entries(query).forEach(([k, v]) => url.searchParams.set(k, v));

    let statusCode: number;
    let headers: Dispatcher.ResponseData['headers'];
    let text: string;
    try {
      const res = await undiciRequest(url.toString(), {
        method: 'GET',
        headers: { Accept: 'application/json' },
        bodyTimeout: this.timeoutMs,
        headersTimeout: this.timeoutMs,
        dispatcher: this.dispatcher,
      });
      statusCode = res.statusCode;
      headers = res.headers;
      text = await res.body.text();
    } catch (err) {
      throw new TransientFetchError(`Request to ${path} failed: ${errorMessage(err)}`, { cause: err });
    }

    if (isRateLimitStatus(statusCode)) {
      const wait = retryAfterMs(headers);
      log.warn({ statusCode, path, retryAfterMs: wait }, 'Rate limited');
      throw new TransientFetchError(`Binance rate limit (${statusCode}) on ${path}`, { retryAfterMs: wait });
    }
    if (statusCode >= 500) {
      throw new TransientFetchError(`Binance server error ${statusCode} on ${path}`);
    }

    const parsed = parseJson(text);
    if (isAuthError(statusCode)) {
      log.error({ statusCode, path }, 'Auth error');
      throw new PermanentFetchError(`Binance API auth error: ${statusCode}`);
    }
    if (statusCode !== 200) {
      const apiError = parsed.ok ? apiErrorSchema.safeParse(parsed.value) : undefined;
      const detail = apiError?.success ? ` ${apiError.data.code}: ${apiError.data.msg}` : '';
      throw new PermanentFetchError(`Binance API error ${statusCode} on ${path}${detail}`);
    }
    if (!parsed.ok) {
      throw new TransientFetchError(`Malformed JSON from ${path}`);
    }
    return parsed.value;
  }

  /**
   * GET + zod validation. A response that does not match the schema is
   * logged (truncated) and treated as permanent.
   */
  async requestPublicValidated<T>(
    path: string,
    query: Record<string, string>,
    schema: z.ZodType<T>,
  ): Promise<T> {
    const raw = await this.requestPublic(path, query);
    const result = schema.safeParse(raw);
    if (result.success) return result.data;

    const payload = JSON.stringify(raw);
    log.warn(
      { path, rawLength: payload.length, raw: payload.slice(0, RAW_PREVIEW_CHARS) },
      'Response validation failed',
    );
    throw new PermanentFetchError(`Binance response validation failed on ${path}: ${result.error.message}`);
  }
}
