/**
 * Binance spot REST endpoints (public market data only).
 * Everything else builds URLs from these constants.
 */

export const BINANCE_REST_BASE = 'https://api.binance.com';
export const BINANCE_US_REST_BASE = 'https://api.binance.us';

/** GET exchange trading rules and symbol information */
export const PUBLIC_EXCHANGE_INFO = '/api/v3/exchangeInfo';

/** GET kline/candlestick bars; startTime inclusive, limit ≤ 1000 */
export const PUBLIC_KLINES = '/api/v3/klines';

export const KLINES_MAX_LIMIT = 1000;

/** Intervals accepted by the klines endpoint */
export const KLINE_INTERVALS = [
  '1s', '1m', '3m', '5m', '15m', '30m',
  '1h', '2h', '4h', '6h', '8h', '12h',
  '1d', '3d', '1w', '1M',
] as const;
