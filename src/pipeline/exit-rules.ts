/**
 * Exit conditions for a monitored trade, checked in strict priority order:
 *
 *   1. Technical breakdown   (EMA cloud flip, support break, MA50 loss, MTF bearish)
 *   2. Profit target         (option ≥ target)
 *   3. Time limit            (per style, boundary inclusive)
 *   4. Stop loss             (option ≤ stop)
 *
 * The first match wins. A trade that breaks down and breaches its stop on the
 * same tick exits as TECHNICAL_BREAKDOWN.
 */

import { exchangeClock, exchangeDate, zonedTime } from '../lib/exchange-time.js';
import type { TradeStyle } from '../types/setup.js';
import { EMA_PAIRS, MTF_BUCKETS, movingAverage, pairLabel } from '../types/snapshot.js';
import type { IndicatorSnapshot } from '../types/snapshot.js';
import type { ExitSignal, TradeRecord } from '../types/trade.js';

/** Support must be lost by more than this fraction of its level. */
export const SUPPORT_BREAK_PCT = 0.005;
/** Price must sit this far under the 50 MA to count as lost. */
export const MA50_BREAK_PCT = 0.002;
/** Bearish higher-timeframe buckets needed for a breakdown. */
export const MTF_BEARISH_MIN = 2;

export const SCALP_CUTOFF = '15:55';
/** Scalps close this long before an early session close. */
export const SCALP_CLOSE_BUFFER_MS = 5 * 60 * 1000;
const DAY_HOLD_MS = 2 * 24 * 60 * 60 * 1000;
const SWING_HOLD_MS = 6 * 7 * 24 * 60 * 60 * 1000;

const usd = (n: number): string => `$${n.toFixed(2)}`;

/** First technical-breakdown reason found, or null when the structure holds. */
export function detectTechnicalBreakdown(
  setup: IndicatorSnapshot,
  current: IndicatorSnapshot,
): string | null {
  // (a) EMA cloud that was bullish at setup has flipped
  for (const pair of EMA_PAIRS) {
    const now = current.trendState[pair];
    if (setup.trendState[pair] === 'Bullish' && now !== 'Bullish') {
      return `${pairLabel(pair)} EMA cloud no longer bullish (now ${now ?? 'N/A'})`;
    }
  }

  // (b) support recorded under the setup price was lost
  for (const support of setup.supportLevels) {
    if (support.level > setup.price) continue;
    if (current.price < support.level * (1 - SUPPORT_BREAK_PCT)) {
      return `Broke ${support.name} support at ${usd(support.level)} (price ${usd(current.price)})`;
    }
  }

  // (c) lost the 50 MA
  const ma50 = movingAverage(current, 50);
  if (ma50 !== undefined && current.price < ma50 * (1 - MA50_BREAK_PCT)) {
    return `Price ${usd(current.price)} below 50 EMA ${usd(ma50)}`;
  }

  // (d) higher timeframes rolled over
  const bearish = MTF_BUCKETS.filter(tf => current.multiTimeframeState[tf] === 'Bearish');
  if (bearish.length >= MTF_BEARISH_MIN) {
    return `Multi-timeframe breakdown (${bearish.join(', ')} bearish)`;
  }

  return null;
}

/**
 * Instant at which a trade of `style` entered at `entryTime` must be closed.
 * Scalps use the earlier of the 15:55 cutoff and five minutes before
 * `sessionClose`, the close of the entry date's session when known.
 */
export function timeLimitFor(
  style: TradeStyle,
  entryTime: Date,
  timeZone: string,
  sessionClose: Date | null = null,
): Date {
  switch (style) {
    case 'scalp': {
      const cutoff = zonedTime(exchangeDate(entryTime, timeZone), SCALP_CUTOFF, timeZone);
      if (!sessionClose) return cutoff;
      const beforeClose = sessionClose.getTime() - SCALP_CLOSE_BUFFER_MS;
      return beforeClose < cutoff.getTime() ? new Date(beforeClose) : cutoff;
    }
    case 'day':   return new Date(entryTime.getTime() + DAY_HOLD_MS);
    case 'swing': return new Date(entryTime.getTime() + SWING_HOLD_MS);
  }
}

function timeLimitDetail(style: TradeStyle, limit: Date, timeZone: string): string {
  switch (style) {
    case 'scalp': return `Scalp time limit reached (${exchangeClock(limit, timeZone)} exchange time)`;
    case 'day':   return 'Day trade time limit reached (2 days)';
    case 'swing': return 'Swing trade time limit reached (6 weeks)';
  }
}

/**
 * Exit signal for a MONITORING trade, or null to keep holding. Trades that
 * were never filled never exit here. `sessionClose` is the close of the
 * session the trade was entered in, when the caller knows it.
 */
export function evaluateExitConditions(
  trade: TradeRecord,
  now: Date,
  snapshot: IndicatorSnapshot,
  optionPrice: number,
  timeZone: string,
  sessionClose: Date | null = null,
): ExitSignal | null {
  if (trade.status !== 'MONITORING' || !trade.entryTime) return null;

  const breakdown = detectTechnicalBreakdown(trade.setupSnapshot, snapshot);
  if (breakdown) return { reason: 'TECHNICAL_BREAKDOWN', detail: breakdown };

  if (trade.targetPrice !== null && optionPrice >= trade.targetPrice) {
    return {
      reason: 'PROFIT_TARGET',
      detail: `Option ${usd(optionPrice)} reached target ${usd(trade.targetPrice)}`,
    };
  }

  const limit = timeLimitFor(trade.style, new Date(trade.entryTime), timeZone, sessionClose);
  if (now.getTime() >= limit.getTime()) {
    return { reason: 'TIME_LIMIT', detail: timeLimitDetail(trade.style, limit, timeZone) };
  }

  if (trade.stopLossPrice !== null && optionPrice <= trade.stopLossPrice) {
    return {
      reason: 'STOP_LOSS',
      detail: `Option ${usd(optionPrice)} hit stop ${usd(trade.stopLossPrice)}`,
    };
  }

  return null;
}
