import { z } from 'zod';

export type Timeframe = '5m' | '1h' | '1d';

/** Alpaca bar timeframe + how far back each request reaches (calendar days). */
export const TIMEFRAME_REQUEST: Record<Timeframe, { alpaca: string; lookbackDays: number }> = {
  '5m': { alpaca: '5Min',  lookbackDays: 10 },
  '1h': { alpaca: '1Hour', lookbackDays: 60 },
  '1d': { alpaca: '1Day',  lookbackDays: 400 },
};

export interface OHLCVBar {
  timestamp: string;  // ISO 8601
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  vwap?: number;
}

// Alpaca bar response shape
export const alpacaBarsResponseSchema = z.object({
  bars: z.array(z.object({
    t:  z.string(),   // timestamp
    o:  z.number(),
    h:  z.number(),
    l:  z.number(),
    c:  z.number(),
    v:  z.number(),
    vw: z.number().optional(),
  })).nullable().default(null),
  symbol: z.string().optional(),
  next_page_token: z.string().nullable().optional(),
});

export type AlpacaBarsResponse = z.infer<typeof alpacaBarsResponseSchema>;

export function normalizeAlpacaBars(response: AlpacaBarsResponse): OHLCVBar[] {
  return (response.bars ?? []).map(b => ({
    timestamp: b.t,
    open: b.o,
    high: b.h,
    low: b.l,
    close: b.c,
    volume: b.v,
    vwap: b.vw,
  }));
}

/** Bars per timeframe used to build one snapshot. */
export interface BarSet {
  intraday: OHLCVBar[];  // 5m
  hourly: OHLCVBar[];    // 1h
  daily: OHLCVBar[];     // 1d
}
