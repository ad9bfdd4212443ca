import { z } from 'zod';
import type { TradeStyle } from './setup.js';

export const dailyStatsSchema = z.object({
  tradesCount:        z.number().default(0),
  wins:               z.number().default(0),
  losses:             z.number().default(0),
  totalPnl:           z.number().default(0),
  totalPnlPercent:    z.number().default(0),
  avgConfluenceScore: z.number().default(0),
  tradeStyles:        z.record(z.string(), z.number()).default({}),
});

export type DailyStats = z.infer<typeof dailyStatsSchema>;

export interface StyleBreakdown {
  count: number;
  pnl: number;
  wins: number;
}

export interface TradeHighlight {
  id: string;
  symbol: string;
  style: TradeStyle;
  pnl: number;
  pnlPercent: number;
  exitReason: string | null;
}

export interface EmptySummary {
  hasData: false;
  periodDays: number;
  message: string;
}

export interface PeriodSummary {
  hasData: true;
  periodDays: number;
  totalTrades: number;
  wins: number;
  losses: number;
  winRate: number;           // percent
  totalPnl: number;
  avgPnlPerTrade: number;
  totalPnlPercent: number;
  avgPnlPercent: number;
  avgConfluenceScore: number;
  styleBreakdown: Partial<Record<TradeStyle, StyleBreakdown>>;
  bestTrade: TradeHighlight;
  worstTrade: TradeHighlight;
}

export type PerformanceSummary = EmptySummary | PeriodSummary;
