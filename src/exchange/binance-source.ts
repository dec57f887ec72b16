import { createChildLogger } from '../logger.js';
import { PermanentFetchError } from '../errors.js';
import type { Candle, TradingPair } from '../types/index.js';
import { formatPair } from '../types/index.js';
import type { ExchangeCandleSource } from './source.js';
import { BinanceClient, type BinanceClientOptions } from './binance/client.js';
import { KLINE_INTERVALS, KLINES_MAX_LIMIT } from './binance/endpoints.js';
import { getExchangeInfo, getKlines } from './binance/rest.js';

const log = createChildLogger('binance-source');

export interface BinanceSourceOptions extends BinanceClientOptions {
  /** Registry id, e.g. `binance` or `binanceus` */
  readonly id?: string;
}

/** Binance spot market data as an `ExchangeCandleSource` */
export class BinanceCandleSource implements ExchangeCandleSource {
  readonly id: string;
  readonly timeframes: readonly string[] = KLINE_INTERVALS;
  readonly maxBatchSize = KLINES_MAX_LIMIT;
  private readonly client: BinanceClient;

  constructor(options: BinanceSourceOptions = {}) {
    this.id = options.id ?? 'binance';
    this.client = new BinanceClient(options);
  }

  async fetchCandles(pair: TradingPair, timeframe: string, since: number, limit: number): Promise<Candle[]> {
    if (!this.timeframes.includes(timeframe)) {
      throw new PermanentFetchError(`Timeframe ${timeframe} is not supported by ${this.id}`);
    }
    const rows = await getKlines(this.client, {
      symbol: toSymbol(pair),
      interval: timeframe,
      startTime: since,
      limit,
    });
    log.debug({ pair: formatPair(pair), timeframe, since, received: rows.length }, 'Klines received');
    return rows.map((k) => ({
      timestamp: k[0],
      open: Number(k[1]),
      high: Number(k[2]),
      low: Number(k[3]),
      close: Number(k[4]),
      volume: Number(k[5]),
    }));
  }

  async listMarkets(): Promise<TradingPair[]> {
    const info = await getExchangeInfo(this.client);
    return info.symbols
      .filter((s) => s.status === 'TRADING' && s.isSpotTradingAllowed !== false)
      .map((s) => ({ base: s.baseAsset, quote: s.quoteAsset }));
  }
}

/** BTC/USDT → BTCUSDT */
export function toSymbol(pair: TradingPair): string {
  return `${pair.base}${pair.quote}`.toUpperCase();
}
