import { describe, it, expect } from 'vitest';
import { averageQuoteVolume, rankPairsByVolume } from '../src/planner/pair-ranking.js';
import { PermanentFetchError } from '../src/errors.js';
import type { ExchangeCandleSource } from '../src/exchange/source.js';
import type { Candle, TradingPair } from '../src/types/index.js';

const DAY = 86_400_000;
const NOW = Date.UTC(2024, 0, 1);

function daily(count: number, close: number, volume: number): Candle[] {
  return Array.from({ length: count }, (_, i) => ({
    timestamp: NOW - (count - i) * DAY,
    open: close,
    high: close,
    low: close,
    close,
    volume,
  }));
}

function rankingSource(byBase: Record<string, Candle[] | Error>, markets: TradingPair[]) {
  const calls: Array<{ base: string; timeframe: string; since: number; limit: number }> = [];
  const source: ExchangeCandleSource = {
    id: 'fake',
    timeframes: ['1d'],
    maxBatchSize: 1000,
    async fetchCandles(pair, timeframe, since, limit) {
      calls.push({ base: pair.base, timeframe, since, limit });
      const result = byBase[pair.base] ?? [];
      if (result instanceof Error) throw result;
      return result;
    },
    async listMarkets() {
      return markets;
    },
  };
  return { source, calls };
}

describe('averageQuoteVolume', () => {
  it('should average close × volume over rolling windows', () => {
    // windows: 1.5×10, 2.5×10, 3.5×10
    expect(averageQuoteVolume([1, 2, 3, 4], [10, 10, 10, 10], 2)).toBe(25);
  });

  it('should need at least one full window', () => {
    expect(averageQuoteVolume([1, 2, 3], [1, 1, 1], 4)).toBeUndefined();
  });
});

describe('rankPairsByVolume', () => {
  const markets: TradingPair[] = [
    { base: 'BTC', quote: 'USDT' },
    { base: 'ETH', quote: 'USDT' },
    { base: 'XRP', quote: 'USDT' },
    { base: 'NEW', quote: 'USDT' },
    { base: 'USDC', quote: 'USDT' },
    { base: 'BTC', quote: 'EUR' },
  ];

  it('should rank by average quote volume, skipping stablecoins and failures', async () => {
    const { source, calls } = rankingSource({
      BTC: daily(100, 10, 5),
      ETH: daily(100, 2, 100),
      XRP: new PermanentFetchError('Invalid symbol'),
      NEW: daily(10, 1, 1),
      USDC: daily(100, 1, 1_000_000),
    }, markets);

    const ranked = await rankPairsByVolume(source, { quote: 'USDT', days: 100, limit: 5, now: NOW });

    expect(ranked).toEqual([
      { pair: { base: 'ETH', quote: 'USDT' }, averageQuoteVolume: 200 },
      { pair: { base: 'BTC', quote: 'USDT' }, averageQuoteVolume: 50 },
    ]);
    expect(calls.map((c) => c.base)).toEqual(['BTC', 'ETH', 'XRP', 'NEW']);
    expect(calls[0]).toEqual({ base: 'BTC', timeframe: '1d', since: NOW - 100 * DAY, limit: 100 });
  });

  it('should keep only the top pairs', async () => {
    const { source } = rankingSource({ BTC: daily(100, 10, 5), ETH: daily(100, 2, 100) }, markets);
    const ranked = await rankPairsByVolume(source, { quote: 'USDT', days: 100, limit: 1, now: NOW });
    expect(ranked.map((r) => r.pair.base)).toEqual(['ETH']);
  });
});
