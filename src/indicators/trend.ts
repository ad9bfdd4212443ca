import type { TrendState } from '../types/snapshot.js';
import { computeEMA } from './moving-average.js';

/** Fast/slow spread (as a fraction of slow) inside which a pair reads Neutral. */
export const NEUTRAL_BAND = 0.0005;

export function classifyCloud(fast: number, slow: number, band = NEUTRAL_BAND): TrendState {
  if (slow <= 0) return 'Neutral';
  const spread = (fast - slow) / slow;
  if (spread > band) return 'Bullish';
  if (spread < -band) return 'Bearish';
  return 'Neutral';
}

/**
 * Trend of a close series from its fast/slow EMA cloud. Series too short for
 * the slow EMA read Neutral.
 */
export function trendFromCloses(closes: number[], fast = 9, slow = 21): TrendState {
  const f = computeEMA(closes, fast);
  const s = computeEMA(closes, slow);
  if (f === null || s === null) return 'Neutral';
  return classifyCloud(f, s);
}
