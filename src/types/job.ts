import type { TradingPair } from './market.js';

export interface FetchJob {
  readonly exchange: string;
  readonly pair: TradingPair;
  readonly timeframe: string;
  readonly startTime: number;
  /** Inclusive upper bound; open-ended when absent */
  readonly endTime?: number;
  readonly batchSize: number;
  readonly outputPath: string;
}

export type FetchState =
  | 'STARTING'
  | 'REQUESTING'
  | 'WRITING'
  | 'RETRYING'
  | 'DONE'
  | 'FAILED'
  | 'CANCELLED';

export type JobStatus = 'done' | 'failed' | 'cancelled';

export interface JobOutcome {
  readonly job: FetchJob;
  readonly status: JobStatus;
  /** A later run can pick the job up again from its resume marker */
  readonly retriable: boolean;
  readonly finalState: FetchState;
  readonly candlesWritten: number;
  readonly batches: number;
  readonly lastTimestamp?: number;
  readonly error?: string;
}

export interface RunSummary {
  readonly outcomes: readonly JobOutcome[];
  readonly done: number;
  readonly failed: number;
  readonly cancelled: number;
  readonly exitCode: number;
}
