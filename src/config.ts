import dotenv from 'dotenv';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

dotenv.config();

function env(key: string, fallback: string): string {
  const v = process.env[key];
  return v !== undefined && v !== '' ? v : fallback;
}

function envNum(key: string, fallback: number): number {
  const v = process.env[key];
  return v !== undefined && v !== '' ? Number(v) : fallback;
}

/** Process-wide settings that exist before any command line is parsed */
export const settings = {
  log: {
    level: env('LOG_LEVEL', 'info'),
    file: env('LOG_FILE', ''),
  },

  binance: {
    restBaseUrl: env('BINANCE_BASE_URL', 'https://api.binance.com'),
  },

  http: {
    requestTimeoutMs: envNum('REQUEST_TIMEOUT_MS', 10_000),
  },
} as const;

export const DEFAULT_LOG_FILE = 'candle-downloader.log';

const isoDate = z
  .string()
  .refine((v) => !Number.isNaN(Date.parse(v)), { message: 'must be an ISO-8601 date' });

const symbolList = z.array(z.string().trim().min(1).transform((s) => s.toUpperCase()));

export const downloaderConfigSchema = z.object({
  exchange: z.string().trim().min(1).transform((s) => s.toLowerCase()),
  allPairs: z.boolean(),
  baseSymbols: symbolList,
  quoteSymbols: symbolList.min(1),
  timeframes: z.array(z.string().trim().min(1)).min(1),
  startTime: isoDate,
  endTime: isoDate.optional(),
  batchSize: z.number().int().positive(),
  outputDirectory: z.string().min(1),
  outputFile: z.string().min(1).optional(),
  enableLogging: z.boolean(),
  concurrency: z.number().int().positive(),
  maxRetries: z.number().int().nonnegative(),
  retryBaseMs: z.number().int().nonnegative(),
  retryMaxMs: z.number().int().nonnegative(),
  emptyResponseThreshold: z.number().int().positive(),
  requestsPerSecond: z.number().positive(),
  mostTraded: z.boolean(),
  mostTradedDays: z.number().int().positive(),
  mostTradedLimit: z.number().int().positive(),
});

export type DownloaderConfigInput = z.input<typeof downloaderConfigSchema>;
type ParsedConfig = z.output<typeof downloaderConfigSchema>;
export type DownloaderConfig = Readonly<Omit<ParsedConfig, 'baseSymbols' | 'quoteSymbols' | 'timeframes'>> & {
  readonly baseSymbols: readonly string[];
  readonly quoteSymbols: readonly string[];
  readonly timeframes: readonly string[];
};
export type ConfigLayer = Partial<DownloaderConfigInput>;

const configFileSchema = downloaderConfigSchema.partial().strict();

export const DEFAULT_CONFIG: DownloaderConfigInput = {
  exchange: 'binance',
  allPairs: false,
  baseSymbols: ['BTC', 'ETH'],
  quoteSymbols: ['USDT'],
  timeframes: ['1h', '1d', '1w', '1M'],
  startTime: '2015-01-01T00:00:00Z',
  batchSize: 1000,
  outputDirectory: './csv_ohlcv',
  enableLogging: false,
  concurrency: 1,
  maxRetries: 5,
  retryBaseMs: 1000,
  retryMaxMs: 60_000,
  emptyResponseThreshold: 1,
  requestsPerSecond: 10,
  mostTraded: false,
  mostTradedDays: 365,
  mostTradedLimit: 100,
};

export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function parseBool(value: string): boolean {
  const v = value.trim().toLowerCase();
  if (v === 'true' || v === '1' || v === 'yes') return true;
  if (v === 'false' || v === '0' || v === 'no' || v === '') return false;
  throw new ConfigurationError(`Invalid boolean: "${value}"`);
}

/**
 * Reads the downloader keys that are set in the environment. Unset or empty
 * variables are left out so lower layers keep their values.
 */
export function configFromEnv(source: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const layer: ConfigLayer = {};
  const read = (key: string): string | undefined => {
    const v = source[key];
    return v !== undefined && v.trim() !== '' ? v : undefined;
  };
  const str = (key: string, apply: (v: string) => void): void => {
    const v = read(key);
    if (v !== undefined) apply(v);
  };

  str('EXCHANGE_NAME', (v) => { layer.exchange = v; });
  str('ALL_PAIRS', (v) => { layer.allPairs = parseBool(v); });
  str('BASE_SYMBOLS', (v) => { layer.baseSymbols = parseList(v); });
  str('QUOTE_SYMBOLS', (v) => { layer.quoteSymbols = parseList(v); });
  str('TIMEFRAMES', (v) => { layer.timeframes = parseList(v); });
  str('START_TIME', (v) => { layer.startTime = v; });
  str('END_TIME', (v) => { layer.endTime = v; });
  str('BATCH_SIZE', (v) => { layer.batchSize = Number(v); });
  str('OUTPUT_DIRECTORY', (v) => { layer.outputDirectory = v; });
  str('OUTPUT_FILE', (v) => { layer.outputFile = v; });
  str('ENABLE_LOGGING', (v) => { layer.enableLogging = parseBool(v); });
  str('CONCURRENCY', (v) => { layer.concurrency = Number(v); });
  str('MAX_RETRIES', (v) => { layer.maxRetries = Number(v); });
  str('RETRY_BASE_MS', (v) => { layer.retryBaseMs = Number(v); });
  str('RETRY_MAX_MS', (v) => { layer.retryMaxMs = Number(v); });
  str('EMPTY_RESPONSE_THRESHOLD', (v) => { layer.emptyResponseThreshold = Number(v); });
  str('REQUESTS_PER_SECOND', (v) => { layer.requestsPerSecond = Number(v); });
  str('MOST_TRADED', (v) => { layer.mostTraded = parseBool(v); });
  str('MOST_TRADED_DAYS', (v) => { layer.mostTradedDays = Number(v); });
  str('MOST_TRADED_LIMIT', (v) => { layer.mostTradedLimit = Number(v); });

  return layer;
}

/** JSON config file: any subset of the downloader keys, unknown keys rejected */
export function loadConfigFile(filePath: string): ConfigLayer {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Cannot read config file ${filePath}: ${reason}`);
  }
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid config file ${filePath}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Merges layers over the defaults (later layers win), validates, and freezes.
 */
export function resolveConfig(...layers: ConfigLayer[]): DownloaderConfig {
  const merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = value;
    }
  }

  const result = downloaderConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  const cfg = result.data;

  if (cfg.endTime !== undefined && Date.parse(cfg.endTime) < Date.parse(cfg.startTime)) {
    throw new ConfigurationError(`endTime ${cfg.endTime} is before startTime ${cfg.startTime}`);
  }
  if (!cfg.allPairs && !cfg.mostTraded && cfg.baseSymbols.length === 0) {
    throw new ConfigurationError('baseSymbols is empty and neither allPairs nor mostTraded is set');
  }

  const frozen: DownloaderConfig = {
    ...cfg,
    baseSymbols: Object.freeze([...cfg.baseSymbols]),
    quoteSymbols: Object.freeze([...cfg.quoteSymbols]),
    timeframes: Object.freeze([...cfg.timeframes]),
  };
  return Object.freeze(frozen);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`)
    .join('; ');
}
