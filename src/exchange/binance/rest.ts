/**
 * Typed Binance public REST calls.
 */

import { KLINES_MAX_LIMIT, PUBLIC_EXCHANGE_INFO, PUBLIC_KLINES } from './endpoints.js';
import type { BinanceClient } from './client.js';
import { exchangeInfoSchema, klinesSchema } from './schemas.js';

export interface KlinesQuery {
  readonly symbol: string;
  readonly interval: string;
  readonly startTime: number;
  readonly limit: number;
}

export async function getKlines(client: BinanceClient, query: KlinesQuery) {
  const q: Record<string, string> = {
    symbol: query.symbol,
    interval: query.interval,
    startTime: String(query.startTime),
    limit: String(Math.min(query.limit, KLINES_MAX_LIMIT)),
  };
  return client.requestPublicValidated(PUBLIC_KLINES, q, klinesSchema);
}

export async function getExchangeInfo(client: BinanceClient) {
  return client.requestPublicValidated(PUBLIC_EXCHANGE_INFO, {}, exchangeInfoSchema);
}
