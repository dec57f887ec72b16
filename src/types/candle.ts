export interface Candle {
  readonly timestamp: number;   // exchange-native epoch unit (ms for Binance)
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}
