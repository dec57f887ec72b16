import { join } from 'node:path';
import { createChildLogger } from '../logger.js';
import type { DownloaderConfig } from '../config.js';
import { ConfigurationError } from '../errors.js';
import type { ExchangeCandleSource } from '../exchange/source.js';
import type { RequestBudget } from '../exchange/rate-limiter.js';
import { isValidTimeframe } from '../candles/timeframe.js';
import { formatPair } from '../types/index.js';
import type { FetchJob, TradingPair } from '../types/index.js';
import { rankPairsByVolume } from './pair-ranking.js';

const log = createChildLogger('job-planner');

/**
 * `{BASE}_{QUOTE}_{timeframe}_{startDate}_{endDate|now}_{exchange}.csv`
 */
export function outputFileName(
  exchange: string,
  pair: TradingPair,
  timeframe: string,
  startTime: string,
  endTime?: string,
): string {
  const startDate = startTime.split('T')[0] ?? startTime;
  const endDate = endTime !== undefined ? (endTime.split('T')[0] ?? endTime) : 'now';
  return `${pair.base}_${pair.quote}_${timeframe}_${startDate}_${endDate}_${exchange}.csv`;
}

function withCsvExtension(name: string): string {
  return name.toLowerCase().endsWith('.csv') ? name : `${name}.csv`;
}

/**
 * Expands the configuration into independent fetch jobs, one per
 * pair × timeframe, each with its own output file.
 */
export class JobPlanner {
  constructor(
    private readonly config: DownloaderConfig,
    private readonly source: ExchangeCandleSource,
    private readonly budget?: RequestBudget,
  ) {}

  async plan(): Promise<FetchJob[]> {
    const { config } = this;
    this.validateTimeframes();

    const pairs = await this.selectPairs();
    if (pairs.length === 0) {
      throw new ConfigurationError('No trading pairs selected');
    }

    const startTime = Date.parse(config.startTime);
    const endTime = config.endTime !== undefined ? Date.parse(config.endTime) : undefined;
    const jobCount = pairs.length * config.timeframes.length;
    if (config.outputFile !== undefined && jobCount !== 1) {
      throw new ConfigurationError(
        `outputFile "${config.outputFile}" is only valid for a single job, but ${jobCount} jobs were planned`,
      );
    }

    const jobs: FetchJob[] = [];
    const seenPaths = new Set<string>();
    for (const pair of pairs) {
      for (const timeframe of config.timeframes) {
        const name = config.outputFile !== undefined
          ? withCsvExtension(config.outputFile)
          : outputFileName(config.exchange, pair, timeframe, config.startTime, config.endTime);
        const outputPath = join(config.outputDirectory, name);
        if (seenPaths.has(outputPath)) {
          throw new ConfigurationError(`Two jobs would write ${outputPath}`);
        }
        seenPaths.add(outputPath);

        jobs.push(Object.freeze({
          exchange: config.exchange,
          pair: Object.freeze({ ...pair }),
          timeframe,
          startTime,
          endTime,
          batchSize: config.batchSize,
          outputPath,
        }));
      }
    }

    log.info(
      { jobs: jobs.length, pairs: pairs.map(formatPair), timeframes: config.timeframes },
      'Jobs planned',
    );
    return jobs;
  }

  private validateTimeframes(): void {
    for (const tf of this.config.timeframes) {
      if (!isValidTimeframe(tf)) {
        throw new ConfigurationError(`Invalid timeframe "${tf}"`);
      }
      if (!this.source.timeframes.includes(tf)) {
        throw new ConfigurationError(
          `Timeframe "${tf}" is not supported by ${this.source.id}. Supported: ${this.source.timeframes.join(', ')}`,
        );
      }
    }
  }

  private async selectPairs(): Promise<TradingPair[]> {
    const { config } = this;
    let pairs: TradingPair[];

    if (config.mostTraded) {
      const quote = config.quoteSymbols[0];
      if (quote === undefined) throw new ConfigurationError('mostTraded needs a quote symbol');
      const ranked = await rankPairsByVolume(this.source, {
        quote,
        days: config.mostTradedDays,
        limit: config.mostTradedLimit,
        budget: this.budget,
      });
      pairs = ranked.map((r) => r.pair);
    } else if (config.allPairs) {
      const markets = await this.source.listMarkets();
      pairs = markets.filter((m) => config.quoteSymbols.includes(m.quote));
    } else {
      pairs = config.baseSymbols.flatMap((base) => config.quoteSymbols.map((quote) => ({ base, quote })));
    }

    const unique = new Map<string, TradingPair>();
    for (const p of pairs) {
      const key = formatPair(p);
      if (!unique.has(key)) unique.set(key, p);
    }
    return [...unique.values()];
  }
}
