import { open, type FileHandle } from 'node:fs/promises';
import { createChildLogger } from '../logger.js';
import { CorruptResumeStateError, errorMessage } from '../errors.js';
import { isHeaderLine, parseCandleRow } from './csv-format.js';

const log = createChildLogger('resume-store');

const INITIAL_WINDOW_BYTES = 1024;

export interface ResumeStore {
  load(outputPath: string): Promise<number | undefined>;
  record(outputPath: string, timestamp: number): void;
  current(outputPath: string): number | undefined;
}

/**
 * Resume markers derived from the output files themselves: the marker is the
 * timestamp of the last complete row. There is no separate state file.
 */
export class ResumeStateStore implements ResumeStore {
  private readonly markers = new Map<string, number>();

  async load(outputPath: string): Promise<number | undefined> {
    const trailing = await readTrailingLine(outputPath);
    if (trailing === undefined) {
      this.markers.delete(outputPath);
      return undefined;
    }
    if (!trailing.terminated) {
      throw new CorruptResumeStateError(outputPath, trailing.line, 'last row is not newline-terminated (torn write)');
    }
    if (isHeaderLine(trailing.line)) {
      this.markers.delete(outputPath);
      return undefined;
    }

    let timestamp: number;
    try {
      timestamp = parseCandleRow(trailing.line).timestamp;
    } catch (err) {
      throw new CorruptResumeStateError(outputPath, trailing.line, errorMessage(err));
    }
    this.markers.set(outputPath, timestamp);
    log.debug({ outputPath, timestamp }, 'Resume marker loaded');
    return timestamp;
  }

  record(outputPath: string, timestamp: number): void {
    const prev = this.markers.get(outputPath);
    if (prev !== undefined && timestamp <= prev) {
      throw new Error(`Resume marker for ${outputPath} must move forward (${prev} → ${timestamp})`);
    }
    this.markers.set(outputPath, timestamp);
  }

  current(outputPath: string): number | undefined {
    return this.markers.get(outputPath);
  }
}

interface TrailingLine {
  readonly line: string;
  /** false when the file does not end in a newline */
  readonly terminated: boolean;
}

/**
 * Reads backwards from the end of the file, doubling the window until a whole
 * line is in view. Trailing blank lines are skipped.
 */
async function readTrailingLine(filePath: string): Promise<TrailingLine | undefined> {
  let handle: FileHandle;
  try {
    handle = await open(filePath, 'r');
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw err;
  }

  try {
    const { size } = await handle.stat();
    if (size === 0) return undefined;

    let window = Math.min(INITIAL_WINDOW_BYTES, size);
    for (;;) {
      const start = size - window;
      const buf = Buffer.alloc(window);
      await handle.read(buf, 0, window, start);
      const text = buf.toString('utf-8');

      if (!text.endsWith('\n')) {
        return { line: text.slice(text.lastIndexOf('\n') + 1), terminated: false };
      }
      const body = text.replace(/[\r\n]+$/, '');
      const newline = body.lastIndexOf('\n');
      if (newline !== -1 || start === 0) {
        if (body.length === 0) return undefined;
        return { line: body.slice(newline + 1).replace(/\r$/, ''), terminated: true };
      }
      window = Math.min(window * 2, size);
    }
  } finally {
    await handle.close();
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
