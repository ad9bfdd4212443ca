import type { OHLCVBar } from '../types/market.js';

/**
 * Relative volume: today's cumulative volume against the average cumulative
 * volume of prior sessions over the same number of bars.
 *
 * `sessions` is ordered oldest → newest; the last entry is today. Returns 1.0
 * when there is no history to compare against.
 */
export function computeRelativeVolume(sessions: OHLCVBar[][]): number {
  const today = sessions[sessions.length - 1];
  if (!today || today.length === 0) return 1;

  const barsSoFar = today.length;
  const todayVolume = sumVolume(today);

  const history = sessions
    .slice(0, -1)
    .filter(s => s.length >= barsSoFar)
    .map(s => sumVolume(s.slice(0, barsSoFar)))
    .filter(v => v > 0);

  if (history.length === 0) return 1;
  const avg = history.reduce((a, b) => a + b, 0) / history.length;
  return avg > 0 ? todayVolume / avg : 1;
}

function sumVolume(bars: OHLCVBar[]): number {
  return bars.reduce((acc, b) => acc + b.volume, 0);
}
