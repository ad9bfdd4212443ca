/**
 * SetupEvaluator — pure rule evaluation over one indicator snapshot.
 *
 * Rules are checked in priority order and the first match wins:
 *   1. Strong bullish confluence (both EMA clouds bullish, RVOL, price > MA21)
 *   2. R1 pivot breakout on elevated volume
 *   3. 1H + 4H multi-timeframe alignment
 */

import { BREAKOUT_RVOL_FACTOR, STYLE_PROFILES } from '../types/setup.js';
import type { SetupDecision, SetupRule, TradeStyle } from '../types/setup.js';
import { movingAverage } from '../types/snapshot.js';
import type { IndicatorSnapshot } from '../types/snapshot.js';

const MAX_SCORE = 100;

/** Additive 0–100 quality score; independent of whether a rule fires. */
export function computeConfluenceScore(snapshot: IndicatorSnapshot): number {
  let score = 0;

  if (snapshot.trendState['9_21'] === 'Bullish') score += 20;
  if (snapshot.trendState['34_50'] === 'Bullish') score += 15;

  const rvol = snapshot.relativeVolume;
  if (rvol > 1.5) score += 25;
  else if (rvol > 1.3) score += 15;
  else if (rvol > 1.1) score += 5;

  const bullishBuckets = Object.values(snapshot.multiTimeframeState).filter(t => t === 'Bullish').length;
  score += bullishBuckets * 10;

  score += snapshot.supportLevels.length * 5;

  return Math.min(score, MAX_SCORE);
}

interface RuleMatch {
  rule: SetupRule;
  reason: string;
}

function matchRule(snapshot: IndicatorSnapshot, threshold: number): RuleMatch | null {
  const { price, relativeVolume: rvol, trendState, multiTimeframeState: mtf, pivots } = snapshot;
  const ma21 = movingAverage(snapshot, 21) ?? 0;

  if (
    trendState['9_21'] === 'Bullish' &&
    trendState['34_50'] === 'Bullish' &&
    rvol > threshold &&
    price > ma21
  ) {
    return {
      rule: 'STRONG_BULLISH_CONFLUENCE',
      reason: `Strong bullish confluence - RVOL: ${rvol.toFixed(1)}x, All EMAs bullish`,
    };
  }

  if (price > pivots.r1 && rvol > threshold * BREAKOUT_RVOL_FACTOR) {
    return {
      rule: 'BREAKOUT',
      reason: `Breakout above R1 pivot ($${pivots.r1.toFixed(2)}) with high volume`,
    };
  }

  if (mtf['1H'] === 'Bullish' && mtf['4H'] === 'Bullish' && rvol > threshold) {
    return {
      rule: 'MTF_ALIGNMENT',
      reason: 'Multi-timeframe bullish alignment with elevated volume',
    };
  }

  return null;
}

export function evaluateSetup(style: TradeStyle, snapshot: IndicatorSnapshot): SetupDecision {
  const threshold = STYLE_PROFILES[style].rvolThreshold;
  const confluenceScore = computeConfluenceScore(snapshot);
  const match = matchRule(snapshot, threshold);

  if (match) {
    return { triggered: true, rule: match.rule, reason: match.reason, confluenceScore };
  }

  return {
    triggered: false,
    rule: null,
    reason: `No ${style} setup conditions met (RVOL: ${snapshot.relativeVolume.toFixed(1)}x, Req: ${threshold.toFixed(1)}x)`,
    confluenceScore,
  };
}
