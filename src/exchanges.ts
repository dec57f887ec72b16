/**
 * Exchanges the downloader can talk to.
 */

import { settings } from './config.js';
import { ConfigurationError } from './errors.js';
import { BinanceCandleSource } from './exchange/binance-source.js';
import { BINANCE_REST_BASE, BINANCE_US_REST_BASE } from './exchange/binance/endpoints.js';
import type { ExchangeCandleSource } from './exchange/source.js';

export interface ExchangeItem {
  id: string;
  name: string;
  restBaseUrl: string;
  docsUrl?: string;
  create(): ExchangeCandleSource;
}

const EXCHANGES: ExchangeItem[] = [
  {
    id: 'binance',
    name: 'Binance',
    restBaseUrl: BINANCE_REST_BASE,
    docsUrl: 'https://developers.binance.com/docs/binance-spot-api-docs/rest-api',
    create: () => new BinanceCandleSource({ id: 'binance', baseUrl: settings.binance.restBaseUrl }),
  },
  {
    id: 'binanceus',
    name: 'Binance.US',
    restBaseUrl: BINANCE_US_REST_BASE,
    docsUrl: 'https://docs.binance.us/',
    create: () => new BinanceCandleSource({ id: 'binanceus', baseUrl: BINANCE_US_REST_BASE }),
  },
];

export function getExchanges(): ExchangeItem[] {
  return [...EXCHANGES];
}

export function createCandleSource(exchangeId: string): ExchangeCandleSource {
  const item = EXCHANGES.find((e) => e.id === exchangeId.toLowerCase());
  if (!item) {
    const known = EXCHANGES.map((e) => e.id).join(', ');
    throw new ConfigurationError(`Unknown exchange "${exchangeId}". Supported: ${known}`);
  }
  return item.create();
}
