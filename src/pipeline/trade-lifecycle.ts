/**
 * Pure trade-record transitions. Each returns a new record; the ledger is the
 * only caller and owns persistence.
 *
 *   SETUP_READY ──enter──▶ ENTERED ──(same op)──▶ MONITORING ──exit──▶ EXITED
 */

import { InvalidTransitionError } from '../lib/errors.js';
import { exchangeClock, exchangeDate } from '../lib/exchange-time.js';
import { STYLE_PROFILES } from '../types/setup.js';
import type { SetupDecision, TradeStyle } from '../types/setup.js';
import type { IndicatorSnapshot } from '../types/snapshot.js';
import type { ExitReason, RiskParams, TradeRecord, TradeStatus } from '../types/trade.js';
import { roundCents, roundTo } from '../utils/round.js';

/** SYMBOL_style_YYYYMMDD_HHMM in exchange-local time. */
export function tradeIdFor(symbol: string, style: TradeStyle, at: Date, timeZone: string): string {
  const date = exchangeDate(at, timeZone).replace(/-/g, '');
  const clock = exchangeClock(at, timeZone).replace(':', '');
  return `${symbol}_${style}_${date}_${clock}`;
}

export function computeRiskLevels(
  fill: number,
  style: TradeStyle,
  risk: RiskParams,
): { stopLossPrice: number; targetPrice: number } {
  const stopLossPrice = roundCents(fill * risk.stopLossFraction);
  const targetPrice = roundCents(fill + (fill - stopLossPrice) * STYLE_PROFILES[style].rewardMultiplier);
  return { stopLossPrice, targetPrice };
}

function requireStatus(trade: TradeRecord, expected: TradeStatus, attempted: string): void {
  if (trade.status !== expected) {
    throw new InvalidTransitionError(trade.id, trade.status, attempted);
  }
}

export interface NewSetup {
  id: string;
  symbol: string;
  style: TradeStyle;
  snapshot: IndicatorSnapshot;
  decision: SetupDecision;
  estimatedEntry: number;
  at: Date;
}

export function createSetupRecord(setup: NewSetup): TradeRecord {
  const at = setup.at.toISOString();
  return {
    id: setup.id,
    symbol: setup.symbol,
    style: setup.style,
    status: 'SETUP_READY',
    setupTime: at,
    setupSnapshot: setup.snapshot,
    setupDecision: setup.decision,
    confluenceScore: setup.decision.confluenceScore,
    estimatedEntry: setup.estimatedEntry,
    actualEntry: null,
    entryTime: null,
    slippage: null,
    stopLossPrice: null,
    targetPrice: null,
    lastPrice: null,
    lastMarkTime: null,
    pnl: 0,
    pnlPercent: 0,
    maxProfit: 0,
    maxDrawdown: 0,
    lastStatusAt: null,
    exitPrice: null,
    exitReason: null,
    exitDetail: null,
    exitTime: null,
    durationMinutes: null,
    transitions: [{ from: null, to: 'SETUP_READY', at }],
  };
}

/** Same fill on an already-monitored trade: the request was a retry. */
export function isDuplicateEntry(trade: TradeRecord, fill: number): boolean {
  return trade.status === 'MONITORING' && trade.actualEntry === fill;
}

export function applyEntry(trade: TradeRecord, fill: number, at: Date, risk: RiskParams): TradeRecord {
  requireStatus(trade, 'SETUP_READY', 'enter');
  const ts = at.toISOString();
  const { stopLossPrice, targetPrice } = computeRiskLevels(fill, trade.style, risk);

  return {
    ...trade,
    status: 'MONITORING',
    actualEntry: fill,
    entryTime: ts,
    slippage: roundCents(fill - trade.estimatedEntry),
    stopLossPrice,
    targetPrice,
    lastPrice: fill,
    lastMarkTime: ts,
    transitions: [
      ...trade.transitions,
      { from: 'SETUP_READY', to: 'ENTERED', at: ts },
      { from: 'ENTERED', to: 'MONITORING', at: ts },
    ],
  };
}

function profitAt(trade: TradeRecord, price: number): { pnl: number; pnlPercent: number } {
  const entry = trade.actualEntry ?? 0;
  const pnl = entry > 0 ? roundCents(price - entry) : 0;
  const pnlPercent = entry > 0 ? roundTo((pnl / entry) * 100, 1) : 0;
  return { pnl, pnlPercent };
}

/** Mark-to-market on a monitoring tick. `statusSent` stamps lastStatusAt. */
export function applyMark(trade: TradeRecord, price: number, at: Date, statusSent = false): TradeRecord {
  requireStatus(trade, 'MONITORING', 'mark');
  const ts = at.toISOString();
  const { pnl, pnlPercent } = profitAt(trade, price);
  const maxProfit = Math.max(trade.maxProfit, pnl);

  return {
    ...trade,
    lastPrice: price,
    lastMarkTime: ts,
    pnl,
    pnlPercent,
    maxProfit,
    maxDrawdown: roundCents(Math.max(trade.maxDrawdown, maxProfit - pnl)),
    lastStatusAt: statusSent ? ts : trade.lastStatusAt,
  };
}

/** Retry of an exit that already landed with the same price and reason. */
export function isDuplicateExit(trade: TradeRecord, price: number, reason: ExitReason): boolean {
  return trade.status === 'EXITED' && trade.exitPrice === price && trade.exitReason === reason;
}

export function applyExit(
  trade: TradeRecord,
  price: number,
  reason: ExitReason,
  detail: string,
  at: Date,
): TradeRecord {
  requireStatus(trade, 'MONITORING', 'exit');
  const ts = at.toISOString();
  const { pnl, pnlPercent } = profitAt(trade, price);
  const maxProfit = Math.max(trade.maxProfit, pnl);
  const started = Date.parse(trade.entryTime ?? trade.setupTime);

  return {
    ...trade,
    status: 'EXITED',
    lastPrice: price,
    lastMarkTime: ts,
    pnl,
    pnlPercent,
    maxProfit,
    maxDrawdown: roundCents(Math.max(trade.maxDrawdown, maxProfit - pnl)),
    exitPrice: price,
    exitReason: reason,
    exitDetail: detail,
    exitTime: ts,
    durationMinutes: roundTo(Math.max(0, at.getTime() - started) / 60_000, 1),
    transitions: [...trade.transitions, { from: 'MONITORING', to: 'EXITED', at: ts }],
  };
}
