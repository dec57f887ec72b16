import { Command } from 'commander';
import { z } from 'zod';
import {
  configFromEnv,
  loadConfigFile,
  parseList,
  resolveConfig,
  type ConfigLayer,
  type DownloaderConfig,
} from './config.js';
import { createChildLogger } from './logger.js';
import { errorMessage } from './errors.js';
import { getExchanges } from './exchanges.js';
import { planDownload, runDownload } from './downloader.js';
import { ResumeStateStore } from './data/resume-store.js';
import { verifyCsv, type CsvReport } from './data/csv-verifier.js';
import { nextTimestamp } from './candles/timeframe.js';
import { EXIT_FAILED, EXIT_INTERRUPTED, EXIT_OK } from './engine/job-runner.js';
import { formatPair, type RunSummary } from './types/index.js';

const log = createChildLogger('cli');

const cliOptionsSchema = z.object({
  config: z.string().optional(),
  exchange: z.string().optional(),
  allPairs: z.boolean().optional(),
  mostTraded: z.boolean().optional(),
  base: z.array(z.string()).optional(),
  quote: z.array(z.string()).optional(),
  timeframes: z.array(z.string()).optional(),
  start: z.string().optional(),
  end: z.string().optional(),
  batchSize: z.number().optional(),
  outputDir: z.string().optional(),
  outputFile: z.string().optional(),
  concurrency: z.number().optional(),
  maxRetries: z.number().optional(),
  rps: z.number().optional(),
  logFile: z.boolean().optional(),
  dryRun: z.boolean().optional(),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

/** Flag values as the top config layer; absent flags leave lower layers alone */
export function cliOptionsToLayer(opts: CliOptions): ConfigLayer {
  return {
    exchange: opts.exchange,
    allPairs: opts.allPairs,
    mostTraded: opts.mostTraded,
    baseSymbols: opts.base,
    quoteSymbols: opts.quote,
    timeframes: opts.timeframes,
    startTime: opts.start,
    endTime: opts.end,
    batchSize: opts.batchSize,
    outputDirectory: opts.outputDir,
    outputFile: opts.outputFile,
    concurrency: opts.concurrency,
    maxRetries: opts.maxRetries,
    requestsPerSecond: opts.rps,
    enableLogging: opts.logFile,
  };
}

/** defaults → environment → config file → flags */
export function buildConfig(opts: CliOptions, env: NodeJS.ProcessEnv = process.env): DownloaderConfig {
  const layers: ConfigLayer[] = [configFromEnv(env)];
  if (opts.config !== undefined) layers.push(loadConfigFile(opts.config));
  layers.push(cliOptionsToLayer(opts));
  return resolveConfig(...layers);
}

function parseCliOptions(raw: unknown): CliOptions {
  const result = cliOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid options: ${result.error.message}`);
  }
  return result.data;
}

function iso(ts: number | undefined): string {
  return ts !== undefined ? new Date(ts).toISOString() : '-';
}

export function formatSummary(summary: RunSummary): string {
  const lines = summary.outcomes.map((o) => {
    const status = o.status.toUpperCase().padEnd(9);
    const detail = o.error !== undefined ? `  ${o.error}` : '';
    return `  ${status} ${formatPair(o.job.pair)} ${o.job.timeframe}  +${o.candlesWritten} candles  last=${iso(o.lastTimestamp)}  ${o.job.outputPath}${detail}`;
  });
  lines.push(`  done=${summary.done} failed=${summary.failed} cancelled=${summary.cancelled}`);
  return lines.join('\n');
}

export function formatReport(report: CsvReport): string {
  const lines = [
    `File:        ${report.filePath}`,
    `Rows:        ${report.rows}`,
    `First:       ${iso(report.first)}`,
    `Last:        ${iso(report.last)}`,
    `Monotonic:   ${report.monotonic ? 'yes' : `no (lines ${report.nonIncreasing.join(', ')})`}`,
    `Bad prices:  ${report.invalidPrices.length}`,
    `Gaps:        ${report.gaps.length}`,
  ];
  for (const gap of report.gaps) {
    lines.push(`  ${iso(gap.after)} → ${iso(gap.before)}  (${gap.missing} missing)`);
  }
  return lines.join('\n');
}

async function downloadAction(raw: unknown): Promise<void> {
  const opts = parseCliOptions(raw);
  const config = buildConfig(opts);

  if (opts.dryRun) {
    const jobs = await planDownload(config);
    const store = new ResumeStateStore();
    console.log(`Planned ${jobs.length} job(s):`);
    for (const job of jobs) {
      const marker = await store.load(job.outputPath).catch((err: unknown) => {
        console.log(`  ! ${job.outputPath}: ${errorMessage(err)}`);
        return undefined;
      });
      const since = marker !== undefined ? nextTimestamp(marker, job.timeframe) : job.startTime;
      console.log(`  ${formatPair(job.pair)} ${job.timeframe}  from ${iso(since)}  → ${job.outputPath}`);
    }
    process.exitCode = EXIT_OK;
    return;
  }

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      log.warn({ signal }, 'Second stop request, exiting now');
      process.exit(EXIT_INTERRUPTED);
    }
    log.warn({ signal }, 'Stop requested, finishing the current batch');
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const summary = await runDownload(config, { signal: controller.signal });
    console.log(formatSummary(summary));
    process.exitCode = summary.exitCode;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

async function verifyAction(file: string, raw: unknown): Promise<void> {
  const opts = z.object({ timeframe: z.string().optional() }).parse(raw);
  const report = await verifyCsv(file, opts.timeframe);
  console.log(formatReport(report));
  process.exitCode = report.monotonic ? EXIT_OK : EXIT_FAILED;
}

function toNumber(value: string): number {
  return Number(value);
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('ohlcv-backfill')
    .description('Download historical OHLCV candles into resumable CSV files')
    .version('0.1.0');

  program
    .command('download', { isDefault: true })
    .description('Download candles for the configured pairs and timeframes')
    .option('-c, --config <path>', 'JSON config file')
    .option('-e, --exchange <id>', 'Exchange id (see `exchanges`)')
    .option('--all-pairs', 'Every active spot pair with one of the quote symbols')
    .option('--most-traded', 'Top pairs by average daily quote volume')
    .option('-b, --base <symbols>', 'Comma-separated base symbols', parseList)
    .option('-q, --quote <symbols>', 'Comma-separated quote symbols', parseList)
    .option('-t, --timeframes <list>', 'Comma-separated timeframes, e.g. 1h,1d', parseList)
    .option('-s, --start <iso>', 'Start time (ISO-8601)')
    .option('--end <iso>', 'End time (ISO-8601), open-ended when omitted')
    .option('--batch-size <n>', 'Candles per request', toNumber)
    .option('-o, --output-dir <path>', 'Output directory')
    .option('--output-file <name>', 'Explicit output file name (single job only)')
    .option('--concurrency <n>', 'Jobs in flight at once', toNumber)
    .option('--max-retries <n>', 'Consecutive transient failures before a job fails', toNumber)
    .option('--rps <n>', 'Requests per second across all jobs', toNumber)
    .option('--log-file', 'Also write logs to candle-downloader.log')
    .option('--dry-run', 'Show the planned jobs and their resume points without downloading')
    .action(downloadAction);

  program
    .command('verify <file>')
    .description('Check a CSV output for ordering problems and gaps')
    .option('-t, --timeframe <tf>', 'Timeframe used to detect gaps')
    .action(verifyAction);

  program
    .command('exchanges')
    .description('List supported exchanges')
    .action(() => {
      for (const e of getExchanges()) {
        console.log(`${e.id.padEnd(12)} ${e.name.padEnd(12)} ${e.restBaseUrl}`);
      }
    });

  return program;
}
