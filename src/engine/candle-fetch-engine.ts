import { createChildLogger } from '../logger.js';
import { PermanentFetchError, TransientFetchError, errorMessage } from '../errors.js';
import { nextTimestamp } from '../candles/timeframe.js';
import type { CandleSink } from '../data/csv-sink.js';
import type { ResumeStore } from '../data/resume-store.js';
import type { RequestBudget } from '../exchange/rate-limiter.js';
import type { ExchangeCandleSource } from '../exchange/source.js';
import { formatPair } from '../types/index.js';
import type { Candle, FetchJob, FetchState, JobOutcome, JobStatus } from '../types/index.js';
import { sleep as defaultSleep } from '../utils/sleep.js';
import { FetchStateMachine } from './fetch-state-machine.js';

const log = createChildLogger('fetch-engine');

export interface EngineOptions {
  /** Consecutive transient failures tolerated before the job fails */
  readonly maxRetries: number;
  readonly retryBaseMs: number;
  readonly retryMaxMs: number;
  /** Empty responses in a row that mean the exchange has no more history */
  readonly emptyResponseThreshold: number;
}

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  maxRetries: 5,
  retryBaseMs: 1000,
  retryMaxMs: 60_000,
  emptyResponseThreshold: 1,
};

export interface EngineDeps {
  readonly source: ExchangeCandleSource;
  readonly sink: CandleSink;
  readonly store: ResumeStore;
  /** Shared request budget of the exchange */
  readonly budget?: RequestBudget;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  readonly now?: () => number;
}

/** Runtime position of one job; lives only for the duration of `run` */
interface FetchCursor {
  nextRequestTimestamp: number;
  consecutiveEmptyResponses: number;
  consecutiveErrors: number;
}

/**
 * Sorts a response, drops candles before `from` (exchange overlap) and
 * repeated timestamps, and cuts everything after `endTime` or from the first
 * candle that has not closed yet.
 */
export function selectNewCandles(
  batch: readonly Candle[],
  from: number,
  endTime?: number,
  isClosed: (c: Candle) => boolean = () => true,
): { candles: Candle[]; truncated: boolean } {
  const sorted = [...batch].sort((a, b) => a.timestamp - b.timestamp);
  const candles: Candle[] = [];
  let truncated = false;
  let prev: number | undefined;

  for (const c of sorted) {
    if (c.timestamp < from) continue;
    if ((endTime !== undefined && c.timestamp > endTime) || !isClosed(c)) {
      truncated = true;
      break;
    }
    if (c.timestamp === prev) continue;
    candles.push(c);
    prev = c.timestamp;
  }
  return { candles, truncated };
}

/**
 * Walks one pair/timeframe forward in bounded batches. Every written batch is
 * a durable checkpoint: rows are fsync'd before the marker moves, so a crash
 * loses at most the batch in flight.
 */
export class CandleFetchEngine {
  private readonly options: EngineOptions;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => number;

  constructor(
    private readonly deps: EngineDeps,
    options: Partial<EngineOptions> = {},
  ) {
    this.options = { ...DEFAULT_ENGINE_OPTIONS, ...options };
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
  }

  async run(job: FetchJob, signal?: AbortSignal): Promise<JobOutcome> {
    const { source, sink, store, budget } = this.deps;
    const { maxRetries, emptyResponseThreshold } = this.options;
    const sm = new FetchStateMachine();
    const jobLog = log.child({
      pair: formatPair(job.pair),
      timeframe: job.timeframe,
      outputPath: job.outputPath,
    });
    let candlesWritten = 0;
    let batches = 0;

    const finish = (to: FetchState, retriable: boolean, error?: string): JobOutcome => {
      sm.transition(to);
      const status: JobStatus = to === 'DONE' ? 'done' : to === 'CANCELLED' ? 'cancelled' : 'failed';
      const outcome: JobOutcome = {
        job,
        status,
        retriable,
        finalState: to,
        candlesWritten,
        batches,
        lastTimestamp: store.current(job.outputPath),
        error,
      };
      const summary = { status, candles: candlesWritten, batches, lastTimestamp: outcome.lastTimestamp };
      if (status === 'failed') {
        jobLog.error({ ...summary, retriable, error }, 'Job failed');
      } else {
        jobLog.info(summary, status === 'done' ? 'Download complete' : 'Job cancelled');
      }
      return outcome;
    };

    let marker: number | undefined;
    try {
      marker = await store.load(job.outputPath);
    } catch (err) {
      // the file needs manual repair; only this job stops
      return finish('FAILED', false, errorMessage(err));
    }

    const cursor: FetchCursor = {
      nextRequestTimestamp: marker !== undefined ? nextTimestamp(marker, job.timeframe) : job.startTime,
      consecutiveEmptyResponses: 0,
      consecutiveErrors: 0,
    };
    if (marker !== undefined) {
      jobLog.info({ marker, since: cursor.nextRequestTimestamp }, 'Resuming from existing output');
    } else {
      jobLog.info({ since: cursor.nextRequestTimestamp }, 'Starting download');
    }

    const limit = Math.min(job.batchSize, source.maxBatchSize);

    try {
      for (;;) {
        if (signal?.aborted) return finish('CANCELLED', true);

        sm.transition('REQUESTING');
        if (job.endTime !== undefined && cursor.nextRequestTimestamp > job.endTime) {
          return finish('DONE', false);
        }

        let batch: Candle[];
        try {
          await budget?.acquire();
          jobLog.debug({ since: cursor.nextRequestTimestamp, limit }, 'Requesting candles');
          batch = await source.fetchCandles(job.pair, job.timeframe, cursor.nextRequestTimestamp, limit);
        } catch (err) {
          if (err instanceof PermanentFetchError) {
            return finish('FAILED', false, errorMessage(err));
          }
          cursor.consecutiveErrors++;
          if (cursor.consecutiveErrors > maxRetries) {
            return finish('FAILED', true, `Gave up after ${maxRetries} retries: ${errorMessage(err)}`);
          }
          const delay = this.backoffDelay(cursor.consecutiveErrors, err);
          jobLog.warn(
            { err: errorMessage(err), attempt: cursor.consecutiveErrors, delay },
            'Transient fetch error, backing off',
          );
          sm.transition('RETRYING');
          await this.sleep(delay, signal);
          continue;
        }
        cursor.consecutiveErrors = 0;

        // the exchange also returns the candle still forming; it is written on a later run
        const closedBy = this.now();
        const { candles, truncated } = selectNewCandles(
          batch,
          cursor.nextRequestTimestamp,
          job.endTime,
          (c) => nextTimestamp(c.timestamp, job.timeframe) <= closedBy,
        );
        const last = candles[candles.length - 1];
        if (last === undefined) {
          if (truncated) return finish('DONE', false);
          cursor.consecutiveEmptyResponses++;
          jobLog.debug({ since: cursor.nextRequestTimestamp, received: batch.length }, 'No new candles');
          if (cursor.consecutiveEmptyResponses >= emptyResponseThreshold) {
            return finish('DONE', false);
          }
          continue;
        }
        cursor.consecutiveEmptyResponses = 0;

        sm.transition('WRITING');
        try {
          await sink.append(job.outputPath, candles);
          store.record(job.outputPath, last.timestamp);
        } catch (err) {
          return finish('FAILED', true, `Write failed: ${errorMessage(err)}`);
        }
        batches++;
        candlesWritten += candles.length;
        cursor.nextRequestTimestamp = nextTimestamp(last.timestamp, job.timeframe);
        jobLog.info({ candles: candlesWritten, batches, last: last.timestamp }, 'Batch written');

        if (truncated) return finish('DONE', false);
      }
    } catch (err) {
      return finish('FAILED', true, errorMessage(err));
    }
  }

  private backoffDelay(attempt: number, err: unknown): number {
    const { retryBaseMs, retryMaxMs } = this.options;
    const delay = Math.min(retryMaxMs, retryBaseMs * 2 ** (attempt - 1));
    if (err instanceof TransientFetchError && err.retryAfterMs !== undefined) {
      return Math.max(delay, err.retryAfterMs);
    }
    return delay;
  }
}
