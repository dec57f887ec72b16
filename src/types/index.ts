export type { Candle } from './candle.js';
export type { TradingPair, PairSymbol } from './market.js';
export { formatPair } from './market.js';
export type {
  FetchJob,
  FetchState,
  JobStatus,
  JobOutcome,
  RunSummary,
} from './job.js';
