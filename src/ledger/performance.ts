/**
 * Performance math over closed trades — daily buckets and trailing windows.
 * Buckets key on the exchange-local date of entry (setup when never entered).
 */

import { addCalendarDays, exchangeDate } from '../lib/exchange-time.js';
import type { DailyStats, PerformanceSummary, StyleBreakdown, TradeHighlight } from '../types/stats.js';
import type { TradeStyle } from '../types/setup.js';
import type { TradeRecord } from '../types/trade.js';
import { roundCents, roundTo } from '../utils/round.js';

export const EMPTY_SUMMARY_MESSAGE = 'No completed trades in the specified period';

export function tradeDate(trade: TradeRecord, timeZone: string): string {
  return exchangeDate(new Date(trade.entryTime ?? trade.setupTime), timeZone);
}

/**
 * Fold one closed trade into its day's bucket. The confluence mean is kept
 * unrounded so repeated folds do not drift; see {@link reportedDailyStats}.
 */
export function addToDailyStats(bucket: DailyStats | undefined, trade: TradeRecord): DailyStats {
  const prev: DailyStats = bucket ?? {
    tradesCount: 0,
    wins: 0,
    losses: 0,
    totalPnl: 0,
    totalPnlPercent: 0,
    avgConfluenceScore: 0,
    tradeStyles: {},
  };

  const n = prev.tradesCount + 1;
  return {
    tradesCount: n,
    wins: prev.wins + (trade.pnl > 0 ? 1 : 0),
    losses: prev.losses + (trade.pnl < 0 ? 1 : 0),
    totalPnl: roundCents(prev.totalPnl + trade.pnl),
    totalPnlPercent: roundTo(prev.totalPnlPercent + trade.pnlPercent, 1),
    avgConfluenceScore: (prev.avgConfluenceScore * (n - 1) + trade.confluenceScore) / n,
    tradeStyles: {
      ...prev.tradeStyles,
      [trade.style]: (prev.tradeStyles[trade.style] ?? 0) + 1,
    },
  };
}

/** Bucket as shown to callers: confluence mean to 2 dp. */
export function reportedDailyStats(bucket: DailyStats): DailyStats {
  return { ...bucket, avgConfluenceScore: roundTo(bucket.avgConfluenceScore, 2) };
}

function highlight(trade: TradeRecord): TradeHighlight {
  return {
    id: trade.id,
    symbol: trade.symbol,
    style: trade.style,
    pnl: trade.pnl,
    pnlPercent: trade.pnlPercent,
    exitReason: trade.exitReason,
  };
}

/**
 * Summary of EXITED trades dated within the trailing `days` window
 * (today − days … today, inclusive).
 */
export function summarize(
  trades: readonly TradeRecord[],
  days: number,
  now: Date,
  timeZone: string,
): PerformanceSummary {
  const cutoff = addCalendarDays(exchangeDate(now, timeZone), -days);
  const closed = trades.filter(t => t.status === 'EXITED' && tradeDate(t, timeZone) >= cutoff);

  const first = closed[0];
  if (!first) {
    return { hasData: false, periodDays: days, message: EMPTY_SUMMARY_MESSAGE };
  }

  const total = closed.length;
  const wins = closed.filter(t => t.pnl > 0).length;
  const losses = closed.filter(t => t.pnl < 0).length;
  const totalPnl = closed.reduce((acc, t) => acc + t.pnl, 0);
  const totalPnlPercent = closed.reduce((acc, t) => acc + t.pnlPercent, 0);
  const totalConfluence = closed.reduce((acc, t) => acc + t.confluenceScore, 0);

  const styleBreakdown: Partial<Record<TradeStyle, StyleBreakdown>> = {};
  let best = first;
  let worst = first;
  for (const t of closed) {
    const row = styleBreakdown[t.style] ?? { count: 0, pnl: 0, wins: 0 };
    styleBreakdown[t.style] = {
      count: row.count + 1,
      pnl: roundCents(row.pnl + t.pnl),
      wins: row.wins + (t.pnl > 0 ? 1 : 0),
    };
    if (t.pnl > best.pnl) best = t;
    if (t.pnl < worst.pnl) worst = t;
  }

  return {
    hasData: true,
    periodDays: days,
    totalTrades: total,
    wins,
    losses,
    winRate: roundTo((wins / total) * 100, 1),
    totalPnl: roundCents(totalPnl),
    avgPnlPerTrade: roundCents(totalPnl / total),
    totalPnlPercent: roundTo(totalPnlPercent, 1),
    avgPnlPercent: roundTo(totalPnlPercent / total, 1),
    avgConfluenceScore: roundTo(totalConfluence / total, 1),
    styleBreakdown,
    bestTrade: highlight(best),
    worstTrade: highlight(worst),
  };
}
