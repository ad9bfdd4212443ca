import { z } from 'zod';

export const TRADE_STYLES = ['scalp', 'day', 'swing'] as const;
export const tradeStyleSchema = z.enum(TRADE_STYLES);
export type TradeStyle = z.infer<typeof tradeStyleSchema>;

export const SETUP_RULES = ['STRONG_BULLISH_CONFLUENCE', 'BREAKOUT', 'MTF_ALIGNMENT'] as const;
export type SetupRule = (typeof SETUP_RULES)[number];

export interface StyleProfile {
  rvolThreshold: number;      // decimal ratio, 1.0 = average volume
  rewardMultiplier: number;   // target = entry + risk × multiplier
  label: string;
}

export const STYLE_PROFILES: Record<TradeStyle, StyleProfile> = {
  scalp: { rvolThreshold: 1.5, rewardMultiplier: 1.2, label: 'Scalp' },
  day:   { rvolThreshold: 1.3, rewardMultiplier: 2.0, label: 'Day' },
  swing: { rvolThreshold: 1.2, rewardMultiplier: 3.0, label: 'Swing' },
};

/** Breakouts need this much more volume than the style threshold. */
export const BREAKOUT_RVOL_FACTOR = 1.2;

export const setupDecisionSchema = z.object({
  triggered:       z.boolean(),
  rule:            z.enum(SETUP_RULES).nullable().default(null),
  reason:          z.string(),
  confluenceScore: z.number().int().min(0).max(100),
});

export type SetupDecision = z.infer<typeof setupDecisionSchema>;
