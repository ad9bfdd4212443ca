import type { OHLCVBar } from '../types/market.js';

export interface ClassicPivots {
  pivot: number;
  r1: number;
  s1: number;
}

/** Floor-trader pivots from the previous session's high, low and close. */
export function computeClassicPivots(prev: Pick<OHLCVBar, 'high' | 'low' | 'close'>): ClassicPivots {
  const pivot = (prev.high + prev.low + prev.close) / 3;
  return {
    pivot,
    r1: 2 * pivot - prev.low,
    s1: 2 * pivot - prev.high,
  };
}

/** High/low across a bar window, or null for an empty window. */
export function rangeOf(bars: OHLCVBar[]): { high: number; low: number } | null {
  if (bars.length === 0) return null;
  let high = -Infinity;
  let low = Infinity;
  for (const b of bars) {
    if (b.high > high) high = b.high;
    if (b.low < low) low = b.low;
  }
  return { high, low };
}
