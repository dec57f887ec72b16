import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { loadCandles, verifyCsv } from '../src/data/csv-verifier.js';
import { HOUR, T0, makeTmpDir, removeTmpDir } from './helpers/fakes.js';

const HEADER = 'timestamp,open,high,low,close,volume';

describe('csv-verifier', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTmpDir();
  });

  afterEach(async () => {
    await removeTmpDir(dir);
  });

  async function fileWith(lines: string[]): Promise<string> {
    const path = join(dir, 'out.csv');
    await writeFile(path, lines.join('\n') + '\n');
    return path;
  }

  it('should report a clean file', async () => {
    const path = await fileWith([HEADER, `${T0},1,2,0.5,1.5,10`, `${T0 + HOUR},1,2,0.5,1.5,10`]);

    expect(await verifyCsv(path, '1h')).toEqual({
      filePath: path,
      rows: 2,
      first: T0,
      last: T0 + HOUR,
      nonIncreasing: [],
      invalidPrices: [],
      gaps: [],
      monotonic: true,
    });
  });

  it('should find gaps, repeated timestamps and bad prices', async () => {
    const path = await fileWith([
      HEADER,
      `${T0},1,2,0.5,1.5,10`,
      `${T0 + HOUR},1,2,0.5,1.5,10`,
      `${T0 + 3 * HOUR},1,0.5,2,1.5,10`,
      `${T0 + 3 * HOUR},1,2,0.5,1.5,10`,
    ]);

    const report = await verifyCsv(path, '1h');

    expect(report.rows).toBe(4);
    expect(report.gaps).toEqual([{ after: T0 + HOUR, before: T0 + 3 * HOUR, missing: 1 }]);
    expect(report.nonIncreasing).toEqual([5]);
    expect(report.invalidPrices).toEqual([4]);
    expect(report.monotonic).toBe(false);
  });

  it('should skip gap detection without a timeframe', async () => {
    const path = await fileWith([HEADER, `${T0},1,2,0.5,1.5,10`, `${T0 + 5 * HOUR},1,2,0.5,1.5,10`]);
    expect((await verifyCsv(path)).gaps).toEqual([]);
  });

  it('should name the line of a malformed row', async () => {
    const path = await fileWith([HEADER, `${T0},1,2,0.5,1.5,10`, 'oops']);
    await expect(loadCandles(path)).rejects.toThrow('Line 3: expected 6 columns, got 1');
  });

  it('should load candles in file order', async () => {
    const path = await fileWith([HEADER, `${T0},1,2,0.5,1.5,10`]);
    expect(await loadCandles(path)).toEqual([{ timestamp: T0, open: 1, high: 2, low: 0.5, close: 1.5, volume: 10 }]);
  });
});
