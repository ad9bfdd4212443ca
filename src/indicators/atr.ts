import type { OHLCVBar } from '../types/market.js';

export interface ATRResult {
  atr: number;
  atrPct: number;  // ATR as % of the last close
}

/**
 * Compute ATR (Average True Range) using Wilder's smoothing
 */
export function computeATR(bars: OHLCVBar[], period = 14): ATRResult {
  if (bars.length < period + 1) return { atr: 0, atrPct: 0 };

  const trValues: number[] = [];
  let prev: OHLCVBar | undefined;
  for (const curr of bars) {
    if (prev) {
      trValues.push(Math.max(
        curr.high - curr.low,
        Math.abs(curr.high - prev.close),
        Math.abs(curr.low - prev.close),
      ));
    }
    prev = curr;
  }

  // First ATR: simple average of first `period` TRs
  let atr = trValues.slice(0, period).reduce((a, b) => a + b, 0) / period;

  // Subsequent ATRs: Wilder's smoothing
  for (const tr of trValues.slice(period)) {
    atr = (atr * (period - 1) + tr) / period;
  }

  const lastClose = bars[bars.length - 1]?.close ?? 0;
  const atrPct = lastClose > 0 ? (atr / lastClose) * 100 : 0;

  return { atr, atrPct };
}
