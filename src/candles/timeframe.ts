/**
 * Timeframe strings as exchanges spell them: `1m`, `15m`, `1h`, `1d`, `1w`, `1M`.
 * `M` is a calendar month; everything else has a fixed duration.
 */

const SECOND_MS = 1000;
const MINUTE_MS = 60 * SECOND_MS;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

const UNIT_MS: Record<string, number> = {
  s: SECOND_MS,
  m: MINUTE_MS,
  h: HOUR_MS,
  d: DAY_MS,
  w: 7 * DAY_MS,
  M: 30 * DAY_MS,
  y: 365 * DAY_MS,
};

export interface Timeframe {
  readonly amount: number;
  readonly unit: string;
}

const PATTERN = /^(\d+)([smhdwMy])$/;

export function parseTimeframe(timeframe: string): Timeframe {
  const match = PATTERN.exec(timeframe.trim());
  const amount = Number(match?.[1]);
  const unit = match?.[2];
  if (unit === undefined || !Number.isInteger(amount) || amount <= 0) {
    throw new Error(`Invalid timeframe "${timeframe}"`);
  }
  return { amount, unit };
}

export function isValidTimeframe(timeframe: string): boolean {
  const match = PATTERN.exec(timeframe.trim());
  return match !== null && Number(match[1]) > 0;
}

/** Nominal duration; a month counts as 30 days */
export function timeframeMs(timeframe: string): number {
  const { amount, unit } = parseTimeframe(timeframe);
  const ms = UNIT_MS[unit];
  if (ms === undefined) throw new Error(`Invalid timeframe "${timeframe}"`);
  return amount * ms;
}

/** Open time of the candle that follows the one opening at `timestamp` */
export function nextTimestamp(timestamp: number, timeframe: string): number {
  const { amount, unit } = parseTimeframe(timeframe);
  if (unit !== 'M') return timestamp + timeframeMs(timeframe);

  const d = new Date(timestamp);
  return Date.UTC(
    d.getUTCFullYear(),
    d.getUTCMonth() + amount,
    d.getUTCDate(),
    d.getUTCHours(),
    d.getUTCMinutes(),
    d.getUTCSeconds(),
    d.getUTCMilliseconds(),
  );
}
