import { readFile } from 'node:fs/promises';
import type { Candle } from '../types/index.js';
import { nextTimestamp } from '../candles/timeframe.js';
import { errorMessage } from '../errors.js';
import { isHeaderLine, parseCandleRow } from './csv-format.js';

export interface CsvGap {
  /** Last timestamp before the gap */
  readonly after: number;
  /** First timestamp after the gap */
  readonly before: number;
  readonly missing: number;
}

export interface CsvReport {
  readonly filePath: string;
  readonly rows: number;
  readonly first?: number;
  readonly last?: number;
  /** Line numbers (1-based) whose timestamp is not greater than the previous row's */
  readonly nonIncreasing: readonly number[];
  /** Line numbers with high < low or a negative price or volume */
  readonly invalidPrices: readonly number[];
  readonly gaps: readonly CsvGap[];
  readonly monotonic: boolean;
}

interface CsvRow {
  readonly lineNumber: number;
  readonly candle: Candle;
}

async function readRows(filePath: string): Promise<CsvRow[]> {
  const raw = await readFile(filePath, 'utf-8');
  const rows: CsvRow[] = [];

  raw.split(/\r?\n/).forEach((line, idx) => {
    if (line.trim().length === 0) return;
    if (idx === 0 && isHeaderLine(line)) return;
    try {
      rows.push({ lineNumber: idx + 1, candle: parseCandleRow(line) });
    } catch (err) {
      throw new Error(`Line ${idx + 1}: ${errorMessage(err)}`);
    }
  });
  return rows;
}

/** Reads every data row in file order; malformed lines throw with their line number */
export async function loadCandles(filePath: string): Promise<Candle[]> {
  return (await readRows(filePath)).map((r) => r.candle);
}

function hasInvalidPrice(c: Candle): boolean {
  return c.high < c.low || c.open < 0 || c.close < 0 || c.low < 0 || c.volume < 0;
}

/**
 * Checks an output file for ordering problems and, with a timeframe, for
 * gaps between consecutive candles.
 */
export async function verifyCsv(filePath: string, timeframe?: string): Promise<CsvReport> {
  const rows = await readRows(filePath);
  const nonIncreasing: number[] = [];
  const invalidPrices: number[] = [];
  const gaps: CsvGap[] = [];

  let prev: Candle | undefined;
  for (const { lineNumber, candle: c } of rows) {
    if (hasInvalidPrice(c)) invalidPrices.push(lineNumber);
    if (prev !== undefined) {
      if (c.timestamp <= prev.timestamp) {
        nonIncreasing.push(lineNumber);
      } else if (timeframe !== undefined) {
        let expected = nextTimestamp(prev.timestamp, timeframe);
        let missing = 0;
        while (expected < c.timestamp) {
          missing++;
          expected = nextTimestamp(expected, timeframe);
        }
        if (missing > 0) gaps.push({ after: prev.timestamp, before: c.timestamp, missing });
      }
    }
    prev = c;
  }

  return {
    filePath,
    rows: rows.length,
    first: rows[0]?.candle.timestamp,
    last: rows[rows.length - 1]?.candle.timestamp,
    nonIncreasing,
    invalidPrices,
    gaps,
    monotonic: nonIncreasing.length === 0,
  };
}
