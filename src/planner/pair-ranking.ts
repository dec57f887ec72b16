import { createChildLogger } from '../logger.js';
import { errorMessage } from '../errors.js';
import type { ExchangeCandleSource } from '../exchange/source.js';
import type { RequestBudget } from '../exchange/rate-limiter.js';
import { timeframeMs } from '../candles/timeframe.js';
import { formatPair, type TradingPair } from '../types/index.js';

const log = createChildLogger('pair-ranking');

/** Bases skipped when ranking: they trade flat against the quote */
export const STABLECOINS: readonly string[] = ['USDT', 'USDC', 'TUSD', 'PAX', 'BUSD', 'DAI', 'FDUSD'];

export const QUOTE_VOLUME_WINDOW = 96;

/**
 * Mean over every full window of (mean close × mean volume).
 * Undefined when there are fewer candles than one window.
 */
export function averageQuoteVolume(
  closes: readonly number[],
  volumes: readonly number[],
  windowSize: number = QUOTE_VOLUME_WINDOW,
): number | undefined {
  const n = Math.min(closes.length, volumes.length);
  if (windowSize <= 0 || n < windowSize) return undefined;

  let sumClose = 0;
  let sumVolume = 0;
  let total = 0;
  let windows = 0;
  for (let i = 0; i < n; i++) {
    sumClose += closes[i] ?? 0;
    sumVolume += volumes[i] ?? 0;
    if (i >= windowSize) {
      sumClose -= closes[i - windowSize] ?? 0;
      sumVolume -= volumes[i - windowSize] ?? 0;
    }
    if (i >= windowSize - 1) {
      total += (sumClose / windowSize) * (sumVolume / windowSize);
      windows++;
    }
  }
  return total / windows;
}

export interface RankOptions {
  readonly quote: string;
  /** Daily candles looked back over */
  readonly days: number;
  /** How many pairs to keep */
  readonly limit: number;
  readonly now?: number;
  readonly budget?: RequestBudget;
}

export interface RankedPair {
  readonly pair: TradingPair;
  readonly averageQuoteVolume: number;
}

/**
 * Ranks the active spot pairs of one quote currency by average daily quote
 * volume. Pairs whose candles cannot be fetched are skipped.
 */
export async function rankPairsByVolume(
  source: ExchangeCandleSource,
  options: RankOptions,
): Promise<RankedPair[]> {
  const now = options.now ?? Date.now();
  const since = now - options.days * timeframeMs('1d');
  const markets = await source.listMarkets();
  const candidates = markets.filter(
    (m) => m.quote === options.quote && !STABLECOINS.includes(m.base),
  );
  log.info({ quote: options.quote, candidates: candidates.length }, 'Ranking pairs by volume');

  const ranked: RankedPair[] = [];
  for (const pair of candidates) {
    try {
      await options.budget?.acquire();
      const candles = await source.fetchCandles(pair, '1d', since, options.days);
      const avg = averageQuoteVolume(
        candles.map((c) => c.close),
        candles.map((c) => c.volume),
      );
      if (avg !== undefined) ranked.push({ pair, averageQuoteVolume: avg });
    } catch (err) {
      log.warn({ pair: formatPair(pair), err: errorMessage(err) }, 'Volume lookup failed, skipping pair');
    }
  }

  ranked.sort((a, b) => b.averageQuoteVolume - a.averageQuoteVolume);
  const top = ranked.slice(0, options.limit);
  log.info({ quote: options.quote, pairs: top.map((r) => formatPair(r.pair)) }, 'Most traded pairs');
  return top;
}
