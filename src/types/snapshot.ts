import { z } from 'zod';

export const TREND_STATES = ['Bullish', 'Bearish', 'Neutral'] as const;
export type TrendState = (typeof TREND_STATES)[number];

/** EMA cloud pairs tracked on the execution timeframe. */
export const EMA_PAIRS = ['9_21', '34_50'] as const;
export type EmaPair = (typeof EMA_PAIRS)[number];

/** Higher-timeframe cloud buckets. */
export const MTF_BUCKETS = ['1H', '4H', '1D'] as const;
export type MtfBucket = (typeof MTF_BUCKETS)[number];

export const MA_PERIODS = [9, 21, 34, 50, 200] as const;
const REQUIRED_MA_PERIODS = [21, 50] as const;

const trendStateSchema = z.enum(TREND_STATES);

export const pivotsSchema = z.object({
  s1:  z.number(),
  r1:  z.number(),
  pdl: z.number(),
  pdh: z.number(),
  pml: z.number(),
  pmh: z.number(),
});

export const supportLevelSchema = z.object({
  name:  z.string().min(1),
  level: z.number().positive(),
});

export const indicatorSnapshotSchema = z.object({
  symbol:    z.string().min(1),
  timestamp: z.string().datetime(),
  price:     z.number().positive(),
  movingAverages: z
    .record(z.string().regex(/^\d+$/, 'period keys must be integers'), z.number().positive())
    .refine(
      mas => REQUIRED_MA_PERIODS.every(p => mas[String(p)] != null),
      { message: `moving averages must include periods ${REQUIRED_MA_PERIODS.join(', ')}` },
    ),
  trendState:          z.record(z.string(), trendStateSchema).default({}),
  multiTimeframeState: z.record(z.string(), trendStateSchema).default({}),
  relativeVolume:      z.number().nonnegative(),
  pivots:              pivotsSchema,
  supportLevels:       z.array(supportLevelSchema).default([]),
  atr:                 z.number().nonnegative().default(0),
  impliedVolatility:   z.number().nonnegative().default(0),
  delta:               z.number().min(-1).max(1).default(0.5),
  swingHigh:           z.number().nonnegative().nullable().default(null),
  swingLow:            z.number().nonnegative().nullable().default(null),
});

export type Pivots = z.infer<typeof pivotsSchema>;
export type SupportLevel = z.infer<typeof supportLevelSchema>;
export type IndicatorSnapshot = z.infer<typeof indicatorSnapshotSchema>;
export type IndicatorSnapshotInput = z.input<typeof indicatorSnapshotSchema>;

/**
 * Build a snapshot from raw collaborator output. Throws a ZodError when the
 * input is incomplete; callers treat that as missing market data.
 */
export function createIndicatorSnapshot(input: IndicatorSnapshotInput): IndicatorSnapshot {
  return indicatorSnapshotSchema.parse(input);
}

export function movingAverage(snapshot: IndicatorSnapshot, period: number): number | undefined {
  return snapshot.movingAverages[String(period)];
}

/** "9_21" → "9/21" */
export function pairLabel(pair: string): string {
  return pair.replace('_', '/');
}
