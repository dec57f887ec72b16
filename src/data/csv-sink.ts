import { mkdir, open } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createChildLogger } from '../logger.js';
import type { Candle } from '../types/index.js';
import { CSV_HEADER, formatCandleRow } from './csv-format.js';

const log = createChildLogger('csv-sink');

/** The part of a file handle the sink writes through */
export interface WritableHandle {
  write(buffer: Buffer, offset: number, length: number): Promise<{ bytesWritten: number }>;
}

export interface CandleSink {
  append(outputPath: string, candles: readonly Candle[]): Promise<void>;
}

/**
 * Append-only CSV writer. The header goes in only when the file is empty;
 * every call is fsync'd before it resolves.
 */
export class CsvSink implements CandleSink {
  async append(outputPath: string, candles: readonly Candle[]): Promise<void> {
    if (candles.length === 0) return;
    assertIncreasing(candles);

    await mkdir(dirname(outputPath), { recursive: true });
    const handle = await open(outputPath, 'a');
    try {
      const { size } = await handle.stat();
      const lines = candles.map(formatCandleRow);
      if (size === 0) lines.unshift(CSV_HEADER);
      await writeFully(handle, Buffer.from(lines.join('\n') + '\n', 'utf-8'));
      await handle.sync();
    } finally {
      await handle.close();
    }
    log.debug({ outputPath, rows: candles.length }, 'Rows appended');
  }
}

function assertIncreasing(candles: readonly Candle[]): void {
  let prev: number | undefined;
  for (const c of candles) {
    if (prev !== undefined && c.timestamp <= prev) {
      throw new Error(`Batch is not strictly increasing at timestamp ${c.timestamp}`);
    }
    prev = c.timestamp;
  }
}

/** `write` may stop short; keep going until the whole buffer is on disk */
export async function writeFully(handle: WritableHandle, data: Buffer): Promise<void> {
  let offset = 0;
  while (offset < data.length) {
    const { bytesWritten } = await handle.write(data, offset, data.length - offset);
    if (bytesWritten <= 0) {
      throw new Error(`Short write: ${offset} of ${data.length} bytes written`);
    }
    offset += bytesWritten;
  }
}
