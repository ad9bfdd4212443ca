/**
 * Option price estimates. There is no options feed behind the tracker, so the
 * premium is a fixed fraction of the underlying and marks move by delta.
 */

import type { IndicatorSnapshot } from '../types/snapshot.js';
import type { TradeRecord } from '../types/trade.js';
import { roundCents } from '../utils/round.js';

const MIN_OPTION_PRICE = 0.01;

export interface PricingModel {
  /** Premium expected for a new setup on `snapshot`. */
  estimateEntry(snapshot: IndicatorSnapshot): number;
  /** Current option mark for an open trade. */
  markPrice(trade: TradeRecord, snapshot: IndicatorSnapshot): number;
}

export class ProxyPricingModel implements PricingModel {
  constructor(private readonly premiumPct = 0.03) {}

  estimateEntry(snapshot: IndicatorSnapshot): number {
    return roundCents(snapshot.price * this.premiumPct);
  }

  markPrice(trade: TradeRecord, snapshot: IndicatorSnapshot): number {
    const entry = trade.actualEntry ?? trade.estimatedEntry;
    const move = snapshot.price - trade.setupSnapshot.price;
    return Math.max(MIN_OPTION_PRICE, roundCents(entry + snapshot.delta * move));
  }
}
