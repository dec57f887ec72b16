import { createChildLogger } from '../logger.js';
import { errorMessage } from '../errors.js';
import type { FetchJob, JobOutcome, RunSummary } from '../types/index.js';
import { formatPair } from '../types/index.js';

const log = createChildLogger('job-runner');

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_INTERRUPTED = 130;

export interface JobExecutor {
  run(job: FetchJob, signal?: AbortSignal): Promise<JobOutcome>;
}

export interface RunOptions {
  /** Jobs in flight at once */
  readonly concurrency?: number;
  readonly signal?: AbortSignal;
}

export function summarize(outcomes: readonly JobOutcome[]): RunSummary {
  const done = outcomes.filter((o) => o.status === 'done').length;
  const failed = outcomes.filter((o) => o.status === 'failed').length;
  const cancelled = outcomes.filter((o) => o.status === 'cancelled').length;
  const exitCode = failed > 0 ? EXIT_FAILED : cancelled > 0 ? EXIT_INTERRUPTED : EXIT_OK;
  return { outcomes, done, failed, cancelled, exitCode };
}

/**
 * Runs jobs on a bounded pool of workers. Outcomes keep the order of `jobs`;
 * one job failing never stops the others.
 */
export async function runJobs(
  jobs: readonly FetchJob[],
  executor: JobExecutor,
  options: RunOptions = {},
): Promise<RunSummary> {
  const concurrency = Math.max(1, Math.min(options.concurrency ?? 1, jobs.length));
  const outcomes: JobOutcome[] = new Array<JobOutcome>(jobs.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < jobs.length) {
      const index = next++;
      const job = jobs[index];
      if (job === undefined) return;
      outcomes[index] = await runOne(job, executor, options.signal);
    }
  };

  log.info({ jobs: jobs.length, concurrency }, 'Running jobs');
  await Promise.all(Array.from({ length: concurrency }, worker));

  const summary = summarize(outcomes);
  log.info(
    { done: summary.done, failed: summary.failed, cancelled: summary.cancelled },
    'All jobs finished',
  );
  return summary;
}

async function runOne(job: FetchJob, executor: JobExecutor, signal?: AbortSignal): Promise<JobOutcome> {
  const label = { pair: formatPair(job.pair), timeframe: job.timeframe };
  log.info(label, 'Downloading candles');
  try {
    return await executor.run(job, signal);
  } catch (err) {
    log.error({ ...label, err: errorMessage(err) }, 'Job crashed');
    return {
      job,
      status: 'failed',
      retriable: true,
      finalState: 'FAILED',
      candlesWritten: 0,
      batches: 0,
      error: errorMessage(err),
    };
  }
}
