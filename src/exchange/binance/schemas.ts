import { z } from 'zod';

const decimalString = z
  .string()
  .refine((v) => v.trim() !== '' && Number.isFinite(Number(v)), { message: 'not a decimal string' });

// ─── klines ──────────────────────────────────────────────────────────────
// [openTime, open, high, low, close, volume, closeTime, quoteVolume, trades, ...]

export const klineSchema = z
  .tuple([z.number().int(), decimalString, decimalString, decimalString, decimalString, decimalString])
  .rest(z.unknown());
export const klinesSchema = z.array(klineSchema);

// ─── exchangeInfo ────────────────────────────────────────────────────────

export const symbolInfoSchema = z.object({
  symbol: z.string(),
  status: z.string(),
  baseAsset: z.string(),
  quoteAsset: z.string(),
  isSpotTradingAllowed: z.boolean().optional(),
});
export const exchangeInfoSchema = z.object({
  symbols: z.array(symbolInfoSchema),
});

// ─── error body ──────────────────────────────────────────────────────────

export const apiErrorSchema = z.object({
  code: z.number(),
  msg: z.string(),
});
