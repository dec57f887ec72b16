import type { Candle } from '../types/index.js';

export const CSV_COLUMNS = ['timestamp', 'open', 'high', 'low', 'close', 'volume'] as const;
export const CSV_HEADER = CSV_COLUMNS.join(',');

export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);
    if (inQuotes) {
      if (ch === '"' && line.charAt(i + 1) === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        current += ch;
      }
    } else {
      if (ch === '"') {
        inQuotes = true;
      } else if (ch === ',') {
        fields.push(current.trim());
        current = '';
      } else {
        current += ch;
      }
    }
  }
  fields.push(current.trim());
  return fields;
}

export function isHeaderLine(line: string): boolean {
  return parseCsvLine(line)[0]?.toLowerCase() === CSV_COLUMNS[0];
}

function parseNumber(field: string | undefined, column: string): number {
  if (field === undefined || field === '') {
    throw new Error(`missing ${column}`);
  }
  const value = Number(field);
  if (!Number.isFinite(value)) {
    throw new Error(`${column} is not a number: "${field}"`);
  }
  return value;
}

/** Parses one data row in the fixed column order; throws with the reason on failure */
export function parseCandleRow(line: string): Candle {
  const fields = parseCsvLine(line);
  if (fields.length !== CSV_COLUMNS.length) {
    throw new Error(`expected ${CSV_COLUMNS.length} columns, got ${fields.length}`);
  }
  const [ts, open, high, low, close, volume] = fields;
  const timestamp = parseNumber(ts, 'timestamp');
  if (!Number.isSafeInteger(timestamp) || timestamp < 0) {
    throw new Error(`timestamp is not a non-negative integer: "${ts ?? ''}"`);
  }
  return {
    timestamp,
    open: parseNumber(open, 'open'),
    high: parseNumber(high, 'high'),
    low: parseNumber(low, 'low'),
    close: parseNumber(close, 'close'),
    volume: parseNumber(volume, 'volume'),
  };
}

/**
 * Plain decimal text for a finite number: the shortest round-trip digits
 * `String()` yields, with exponent notation expanded.
 */
export function formatDecimal(value: number): string {
  if (!Number.isFinite(value)) {
    throw new Error(`Cannot write non-finite value ${value}`);
  }
  const s = String(value);
  const [mantissa = '', exponent] = s.split('e');
  if (exponent === undefined) return s;

  const negative = mantissa.startsWith('-');
  const unsigned = negative ? mantissa.slice(1) : mantissa;
  const [intPart = '', fracPart = ''] = unsigned.split('.');
  const digits = intPart + fracPart;
  const point = intPart.length + Number(exponent);

  let out: string;
  if (point <= 0) {
    out = `0.${'0'.repeat(-point)}${digits}`;
  } else if (point >= digits.length) {
    out = digits + '0'.repeat(point - digits.length);
  } else {
    out = `${digits.slice(0, point)}.${digits.slice(point)}`;
  }
  return negative ? `-${out}` : out;
}

export function formatCandleRow(c: Candle): string {
  return [
    String(c.timestamp),
    formatDecimal(c.open),
    formatDecimal(c.high),
    formatDecimal(c.low),
    formatDecimal(c.close),
    formatDecimal(c.volume),
  ].join(',');
}
