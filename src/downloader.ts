import { DEFAULT_LOG_FILE, settings, type DownloaderConfig } from './config.js';
import { enableFileLogging } from './logger.js';
import { createCandleSource } from './exchanges.js';
import { RateLimiter } from './exchange/rate-limiter.js';
import type { ExchangeCandleSource } from './exchange/source.js';
import { CsvSink } from './data/csv-sink.js';
import { ResumeStateStore } from './data/resume-store.js';
import { CandleFetchEngine } from './engine/candle-fetch-engine.js';
import { runJobs } from './engine/job-runner.js';
import { JobPlanner } from './planner/job-planner.js';
import type { FetchJob, RunSummary } from './types/index.js';

export interface DownloadDeps {
  /** Defaults to the registry entry for `config.exchange` */
  readonly source?: ExchangeCandleSource;
  readonly signal?: AbortSignal;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export function applyLogging(config: DownloaderConfig): void {
  if (config.enableLogging) {
    enableFileLogging(settings.log.file || DEFAULT_LOG_FILE);
  }
}

/** Plans the jobs without fetching any candles */
export async function planDownload(
  config: DownloaderConfig,
  source: ExchangeCandleSource = createCandleSource(config.exchange),
): Promise<FetchJob[]> {
  return new JobPlanner(config, source, new RateLimiter(config.requestsPerSecond)).plan();
}

/**
 * Plans and runs every job. Configuration problems throw before any job
 * starts; per-job failures end up in the summary.
 */
export async function runDownload(config: DownloaderConfig, deps: DownloadDeps = {}): Promise<RunSummary> {
  applyLogging(config);
  const source = deps.source ?? createCandleSource(config.exchange);
  // one bucket per exchange, shared by every job
  const budget = new RateLimiter(config.requestsPerSecond);

  const jobs = await new JobPlanner(config, source, budget).plan();
  const engine = new CandleFetchEngine(
    { source, sink: new CsvSink(), store: new ResumeStateStore(), budget, sleep: deps.sleep },
    {
      maxRetries: config.maxRetries,
      retryBaseMs: config.retryBaseMs,
      retryMaxMs: config.retryMaxMs,
      emptyResponseThreshold: config.emptyResponseThreshold,
    },
  );
  return runJobs(jobs, engine, { concurrency: config.concurrency, signal: deps.signal });
}
