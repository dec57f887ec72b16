import type { Candle, TradingPair } from '../types/index.js';

/**
 * What the downloader needs from an exchange. Implementations throw
 * `TransientFetchError` for failures worth retrying and `PermanentFetchError`
 * for everything else they can classify.
 */
export interface ExchangeCandleSource {
  readonly id: string;
  /** Timeframe strings the exchange serves */
  readonly timeframes: readonly string[];
  /** Largest `limit` one request honours; larger values are clamped */
  readonly maxBatchSize: number;

  /** Up to `limit` candles opening at or after `since`, ascending */
  fetchCandles(pair: TradingPair, timeframe: string, since: number, limit: number): Promise<Candle[]>;

  /** Active spot markets */
  listMarkets(): Promise<TradingPair[]>;
}
