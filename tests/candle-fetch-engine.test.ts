import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { CandleFetchEngine, selectNewCandles, type EngineDeps } from '../src/engine/candle-fetch-engine.js';
import { CsvSink, type CandleSink } from '../src/data/csv-sink.js';
import { ResumeStateStore } from '../src/data/resume-store.js';
import { PermanentFetchError, TransientFetchError } from '../src/errors.js';
import { FakeSource, HOUR, T0, hourly, makeCandle, makeJob, makeTmpDir, removeTmpDir } from './helpers/fakes.js';

const HEADER = 'timestamp,open,high,low,close,volume';
const row = (ts: number) => `${ts},100,110,90,105,12.5`;

function deps(source: FakeSource, overrides: Partial<EngineDeps> = {}) {
  const delays: number[] = [];
  const sleep = vi.fn(async (ms: number) => { delays.push(ms); });
  const engineDeps: EngineDeps = {
    source,
    sink: new CsvSink(),
    store: new ResumeStateStore(),
    sleep,
    ...overrides,
  };
  return { engineDeps, delays, sleep };
}

describe('CandleFetchEngine', () => {
  let dir: string;
  let outputPath: string;

  beforeEach(async () => {
    dir = await makeTmpDir();
    outputPath = join(dir, 'BTC_USDT_1h.csv');
  });

  afterEach(async () => {
    await removeTmpDir(dir);
  });

  it('should download the full history in batches and stop on an empty response', async () => {
    const source = new FakeSource({ history: hourly(3) });
    const engine = new CandleFetchEngine(deps(source).engineDeps);

    const outcome = await engine.run(makeJob(outputPath));

    expect(outcome.status).toBe('done');
    expect(outcome.finalState).toBe('DONE');
    expect(outcome.retriable).toBe(false);
    expect(outcome.candlesWritten).toBe(3);
    expect(outcome.batches).toBe(2);
    expect(outcome.lastTimestamp).toBe(T0 + 2 * HOUR);
    expect(source.calls.map((c) => c.since)).toEqual([T0, T0 + 2 * HOUR, T0 + 3 * HOUR]);
    expect(source.calls.every((c) => c.limit === 2)).toBe(true);

    const content = await readFile(outputPath, 'utf-8');
    expect(content).toBe([HEADER, row(T0), row(T0 + HOUR), row(T0 + 2 * HOUR)].join('\n') + '\n');
  });

  it('should resume from the last row of an existing file', async () => {
    await writeFile(outputPath, [HEADER, row(T0), row(T0 + HOUR)].join('\n') + '\n');
    const source = new FakeSource({ history: hourly(3) });
    const engine = new CandleFetchEngine(deps(source).engineDeps);

    const outcome = await engine.run(makeJob(outputPath));

    expect(source.calls[0]?.since).toBe(1609466400000);
    expect(outcome.candlesWritten).toBe(1);
    const content = await readFile(outputPath, 'utf-8');
    expect(content).toBe([HEADER, row(T0), row(T0 + HOUR), row(T0 + 2 * HOUR)].join('\n') + '\n');
  });

  it('should leave a complete file byte-identical when run again', async () => {
    const source = new FakeSource({ history: hourly(3) });
    await new CandleFetchEngine(deps(source).engineDeps).run(makeJob(outputPath));
    const first = await readFile(outputPath);

    const again = await new CandleFetchEngine(deps(source).engineDeps).run(makeJob(outputPath));
    const second = await readFile(outputPath);

    expect(again.status).toBe('done');
    expect(again.candlesWritten).toBe(0);
    expect(again.lastTimestamp).toBe(T0 + 2 * HOUR);
    expect(second.equals(first)).toBe(true);
  });

  it('should never write candles after endTime', async () => {
    const source = new FakeSource({ history: hourly(3) });
    const engine = new CandleFetchEngine(deps(source).engineDeps);

    const outcome = await engine.run(makeJob(outputPath, { batchSize: 3, endTime: T0 + HOUR }));

    expect(outcome.status).toBe('done');
    expect(outcome.candlesWritten).toBe(2);
    expect(source.calls).toHaveLength(1);
    const content = await readFile(outputPath, 'utf-8');
    expect(content).toBe([HEADER, row(T0), row(T0 + HOUR)].join('\n') + '\n');
  });

  it('should leave the candle still forming for a later run', async () => {
    const source = new FakeSource({ history: hourly(3) });
    const midThirdHour = T0 + 2 * HOUR + 30 * 60_000;

    const first = await new CandleFetchEngine(deps(source, { now: () => midThirdHour }).engineDeps)
      .run(makeJob(outputPath, { batchSize: 3 }));

    expect(first.status).toBe('done');
    expect(first.candlesWritten).toBe(2);
    expect(first.lastTimestamp).toBe(T0 + HOUR);
    expect(source.calls).toHaveLength(1);
    expect(await readFile(outputPath, 'utf-8')).toBe([HEADER, row(T0), row(T0 + HOUR)].join('\n') + '\n');

    const second = await new CandleFetchEngine(deps(source, { now: () => T0 + 3 * HOUR }).engineDeps)
      .run(makeJob(outputPath, { batchSize: 3 }));

    expect(second.candlesWritten).toBe(1);
    expect(source.calls[1]?.since).toBe(T0 + 2 * HOUR);
    expect(await readFile(outputPath, 'utf-8'))
      .toBe([HEADER, row(T0), row(T0 + HOUR), row(T0 + 2 * HOUR)].join('\n') + '\n');
  });

  it('should finish without a request once the cursor is past endTime', async () => {
    await writeFile(outputPath, [HEADER, row(T0), row(T0 + HOUR)].join('\n') + '\n');
    const source = new FakeSource({ history: hourly(3) });
    const engine = new CandleFetchEngine(deps(source).engineDeps);

    const outcome = await engine.run(makeJob(outputPath, { endTime: T0 + HOUR }));

    expect(outcome.status).toBe('done');
    expect(source.calls).toHaveLength(0);
  });

  it('should retry transient errors with exponential backoff', async () => {
    const source = new FakeSource({
      history: hourly(3),
      failures: [new TransientFetchError('timeout'), new TransientFetchError('timeout')],
    });
    const { engineDeps, delays } = deps(source);
    const engine = new CandleFetchEngine(engineDeps, { retryBaseMs: 1000, maxRetries: 5 });

    const outcome = await engine.run(makeJob(outputPath));

    expect(outcome.status).toBe('done');
    expect(outcome.candlesWritten).toBe(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it('should cap the backoff at retryMaxMs and honour Retry-After', async () => {
    const source = new FakeSource({
      history: hourly(1),
      failures: [
        new TransientFetchError('busy'),
        new TransientFetchError('busy'),
        new TransientFetchError('busy'),
        new TransientFetchError('rate limited', { retryAfterMs: 5000 }),
      ],
    });
    const { engineDeps, delays } = deps(source);
    const engine = new CandleFetchEngine(engineDeps, { retryBaseMs: 1000, retryMaxMs: 3000 });

    await engine.run(makeJob(outputPath));

    expect(delays).toEqual([1000, 2000, 3000, 5000]);
  });

  it('should fail as retriable after maxRetries consecutive transient errors', async () => {
    const boom = () => new TransientFetchError('boom');
    const source = new FakeSource({ history: hourly(3), failures: [boom(), boom(), boom()] });
    const { engineDeps, delays } = deps(source);
    const engine = new CandleFetchEngine(engineDeps, { maxRetries: 2 });

    const outcome = await engine.run(makeJob(outputPath));

    expect(outcome.status).toBe('failed');
    expect(outcome.retriable).toBe(true);
    expect(outcome.error).toBe('Gave up after 2 retries: boom');
    expect(source.calls).toHaveLength(3);
    expect(delays).toEqual([1000, 2000]);
    expect(existsSync(outputPath)).toBe(false);
  });

  it('should fail immediately on a permanent error', async () => {
    const source = new FakeSource({ history: hourly(3), failures: [new PermanentFetchError('Invalid symbol')] });
    const { engineDeps, sleep } = deps(source);
    const engine = new CandleFetchEngine(engineDeps);

    const outcome = await engine.run(makeJob(outputPath));

    expect(outcome.status).toBe('failed');
    expect(outcome.retriable).toBe(false);
    expect(outcome.error).toBe('Invalid symbol');
    expect(source.calls).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should refuse to touch a file with a torn last row', async () => {
    const torn = `${HEADER}\n${row(T0)}\n16094628`;
    await writeFile(outputPath, torn);
    const source = new FakeSource({ history: hourly(3) });
    const engine = new CandleFetchEngine(deps(source).engineDeps);

    const outcome = await engine.run(makeJob(outputPath));

    expect(outcome.status).toBe('failed');
    expect(outcome.retriable).toBe(false);
    expect(outcome.finalState).toBe('FAILED');
    expect(outcome.error).toBe(`Corrupt resume state in ${outputPath}: last row is not newline-terminated (torn write)`);
    expect(source.calls).toHaveLength(0);
    expect(await readFile(outputPath, 'utf-8')).toBe(torn);
  });

  it('should stop between batches when the signal aborts', async () => {
    const controller = new AbortController();
    const source = new FakeSource({ history: hourly(5), onFetch: () => controller.abort() });
    const engine = new CandleFetchEngine(deps(source).engineDeps);

    const outcome = await engine.run(makeJob(outputPath), controller.signal);

    expect(outcome.status).toBe('cancelled');
    expect(outcome.finalState).toBe('CANCELLED');
    expect(outcome.retriable).toBe(true);
    expect(outcome.candlesWritten).toBe(2);
    expect(outcome.lastTimestamp).toBe(T0 + HOUR);
    expect(source.calls).toHaveLength(1);
  });

  it('should not request anything when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const source = new FakeSource({ history: hourly(3) });
    const engine = new CandleFetchEngine(deps(source).engineDeps);

    const outcome = await engine.run(makeJob(outputPath), controller.signal);

    expect(outcome.status).toBe('cancelled');
    expect(source.calls).toHaveLength(0);
  });

  it('should report a failed write as retriable', async () => {
    const sink: CandleSink = { append: vi.fn(async () => { throw new Error('disk full'); }) };
    const source = new FakeSource({ history: hourly(3) });
    const engine = new CandleFetchEngine(deps(source, { sink }).engineDeps);

    const outcome = await engine.run(makeJob(outputPath));

    expect(outcome.status).toBe('failed');
    expect(outcome.retriable).toBe(true);
    expect(outcome.error).toBe('Write failed: disk full');
    expect(outcome.lastTimestamp).toBeUndefined();
  });

  it('should tolerate empty responses up to the threshold', async () => {
    const source = new FakeSource();
    const engine = new CandleFetchEngine(deps(source).engineDeps, { emptyResponseThreshold: 3 });

    const outcome = await engine.run(makeJob(outputPath));

    expect(outcome.status).toBe('done');
    expect(outcome.candlesWritten).toBe(0);
    expect(source.calls).toHaveLength(3);
    expect(existsSync(outputPath)).toBe(false);
  });

  it('should clamp the batch size to what the exchange serves', async () => {
    const source = new FakeSource({ history: hourly(3), maxBatchSize: 2 });
    const engine = new CandleFetchEngine(deps(source).engineDeps);

    await engine.run(makeJob(outputPath, { batchSize: 500 }));

    expect(source.calls[0]?.limit).toBe(2);
  });

  it('should draw every request from the shared budget', async () => {
    const budget = { acquire: vi.fn(async () => {}) };
    const source = new FakeSource({ history: hourly(3) });
    const engine = new CandleFetchEngine(deps(source, { budget }).engineDeps);

    await engine.run(makeJob(outputPath));

    expect(budget.acquire).toHaveBeenCalledTimes(source.calls.length);
  });
});

describe('selectNewCandles', () => {
  it('should sort, drop overlap and duplicates, and cut at endTime', () => {
    const c0 = makeCandle(T0);
    const c1 = makeCandle(T0 + HOUR);
    const c2 = makeCandle(T0 + 2 * HOUR);

    const result = selectNewCandles([c2, c0, c1, c1], T0 + HOUR, T0 + HOUR);

    expect(result).toEqual({ candles: [c1], truncated: true });
  });

  it('should stop at the first candle that has not closed', () => {
    const batch = hourly(3);
    const result = selectNewCandles(batch, T0, undefined, (c) => c.timestamp < T0 + 2 * HOUR);
    expect(result).toEqual({ candles: batch.slice(0, 2), truncated: true });
  });

  it('should keep everything at or after the cursor without an endTime', () => {
    const batch = hourly(3);
    expect(selectNewCandles(batch, T0)).toEqual({ candles: batch, truncated: false });
  });
});
