export * from './types/index.js';
export {
  DEFAULT_CONFIG,
  configFromEnv,
  loadConfigFile,
  resolveConfig,
  type ConfigLayer,
  type DownloaderConfig,
  type DownloaderConfigInput,
} from './config.js';
export {
  ConfigurationError,
  CorruptResumeStateError,
  FetchError,
  PermanentFetchError,
  TransientFetchError,
} from './errors.js';
export { nextTimestamp, parseTimeframe, timeframeMs } from './candles/timeframe.js';
export { CSV_HEADER, formatCandleRow, parseCandleRow } from './data/csv-format.js';
export { CsvSink, type CandleSink } from './data/csv-sink.js';
export { ResumeStateStore, type ResumeStore } from './data/resume-store.js';
export { verifyCsv, loadCandles, type CsvReport } from './data/csv-verifier.js';
export { RateLimiter, type RequestBudget } from './exchange/rate-limiter.js';
export type { ExchangeCandleSource } from './exchange/source.js';
export { BinanceCandleSource } from './exchange/binance-source.js';
export { createCandleSource, getExchanges } from './exchanges.js';
export { FetchStateMachine } from './engine/fetch-state-machine.js';
export { CandleFetchEngine, DEFAULT_ENGINE_OPTIONS, type EngineOptions } from './engine/candle-fetch-engine.js';
export { runJobs, summarize, EXIT_OK, EXIT_FAILED, EXIT_INTERRUPTED } from './engine/job-runner.js';
export { JobPlanner, outputFileName } from './planner/job-planner.js';
export { rankPairsByVolume } from './planner/pair-ranking.js';
export { planDownload, runDownload } from './downloader.js';
