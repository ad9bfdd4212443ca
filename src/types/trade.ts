import { z } from 'zod';
import { indicatorSnapshotSchema } from './snapshot.js';
import { setupDecisionSchema, tradeStyleSchema } from './setup.js';

export const TRADE_STATUSES = ['SETUP_READY', 'ENTERED', 'MONITORING', 'EXITED'] as const;
export const tradeStatusSchema = z.enum(TRADE_STATUSES);
export type TradeStatus = z.infer<typeof tradeStatusSchema>;

export const EXIT_REASONS = [
  'TECHNICAL_BREAKDOWN',
  'PROFIT_TARGET',
  'TIME_LIMIT',
  'STOP_LOSS',
  'MANUAL',
] as const;
export const exitReasonSchema = z.enum(EXIT_REASONS);
export type ExitReason = z.infer<typeof exitReasonSchema>;

export const transitionSchema = z.object({
  from: tradeStatusSchema.nullable(),
  to:   tradeStatusSchema,
  at:   z.string(),
});
export type TradeTransition = z.infer<typeof transitionSchema>;

/**
 * Persisted trade record. Every field past the identity block defaults so
 * that logs written by older builds still load.
 */
export const tradeRecordSchema = z.object({
  id:     z.string().min(1),
  symbol: z.string().min(1),
  style:  tradeStyleSchema,
  status: tradeStatusSchema,

  setupTime:       z.string(),
  setupSnapshot:   indicatorSnapshotSchema,
  setupDecision:   setupDecisionSchema,
  confluenceScore: z.number().default(0),

  estimatedEntry: z.number().default(0),
  actualEntry:    z.number().nullable().default(null),
  entryTime:      z.string().nullable().default(null),
  slippage:       z.number().nullable().default(null),
  stopLossPrice:  z.number().nullable().default(null),
  targetPrice:    z.number().nullable().default(null),

  lastPrice:    z.number().nullable().default(null),
  lastMarkTime: z.string().nullable().default(null),
  pnl:          z.number().default(0),
  pnlPercent:   z.number().default(0),
  maxProfit:    z.number().default(0),
  maxDrawdown:  z.number().default(0),
  lastStatusAt: z.string().nullable().default(null),

  exitPrice:       z.number().nullable().default(null),
  exitReason:      exitReasonSchema.nullable().default(null),
  exitDetail:      z.string().nullable().default(null),
  exitTime:        z.string().nullable().default(null),
  durationMinutes: z.number().nullable().default(null),

  transitions: z.array(transitionSchema).default([]),
});

export type TradeRecord = z.infer<typeof tradeRecordSchema>;

/** Exit condition produced by a monitoring tick. */
export interface ExitSignal {
  reason: ExitReason;
  detail: string;
}

export interface RiskParams {
  stopLossFraction: number;  // stop = fill × fraction
}

export const DEFAULT_RISK_PARAMS: RiskParams = { stopLossFraction: 0.5 };
