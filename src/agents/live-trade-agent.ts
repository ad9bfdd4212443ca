/**
 * LiveTradeAgent — drives one trade at a time through its lifecycle.
 *
 *   enter()  SETUP_READY → ENTERED → MONITORING   (fill supplied externally)
 *   check()  MONITORING: exit conditions, else mark-to-market + status update
 *   exit()   MONITORING → EXITED                    (exit condition or manual)
 *
 * Every mutation runs under the trade's lock and is persisted by the ledger
 * before any notification goes out. A notification failure is logged only.
 */

import { exchangeDate } from '../lib/exchange-time.js';
import { KeyedMutex } from '../lib/keyed-mutex.js';
import type { MarketSessions } from '../lib/market-calendar.js';
import { evaluateExitConditions } from '../pipeline/exit-rules.js';
import type { TradeLedger } from '../ledger/trade-ledger.js';
import {
  formatEntryConfirmation,
  formatExitNotification,
  formatStatusUpdate,
} from '../telegram/notifier.js';
import type { Notifier } from '../telegram/notifier.js';
import type { IndicatorSnapshot } from '../types/snapshot.js';
import type { ExitReason, TradeRecord } from '../types/trade.js';

export const DEFAULT_STATUS_INTERVAL_MS = 5 * 60 * 1000;

export interface LiveTradeAgentDeps {
  ledger: TradeLedger;
  notifier: Notifier;
  timeZone: string;
  /** Session table for early-close time limits; without it scalps use 15:55. */
  sessions?: MarketSessions;
  mutex?: KeyedMutex;
  statusIntervalMs?: number;
  clock?: () => Date;
}

export type CheckOutcome =
  | { kind: 'inactive' }
  | { kind: 'held'; trade: Readonly<TradeRecord>; statusSent: boolean }
  | { kind: 'exited'; trade: Readonly<TradeRecord> };

export class LiveTradeAgent {
  readonly mutex: KeyedMutex;
  private readonly statusIntervalMs: number;
  private readonly clock: () => Date;

  constructor(private readonly deps: LiveTradeAgentDeps) {
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.statusIntervalMs = deps.statusIntervalMs ?? DEFAULT_STATUS_INTERVAL_MS;
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Record a fill. Waits for any in-flight check on the same trade. */
  async enter(tradeId: string, fill: number): Promise<Readonly<TradeRecord>> {
    return this.mutex.runExclusive(tradeId, async () => {
      const { trade, changed } = await this.deps.ledger.recordEntry(tradeId, fill, this.clock());
      if (changed) {
        console.log(
          `[LiveTrade ${trade.symbol}] ${trade.id} entered @ $${fill.toFixed(2)}` +
          ` — stop $${trade.stopLossPrice?.toFixed(2)} target $${trade.targetPrice?.toFixed(2)}`,
        );
        await this.send(trade, formatEntryConfirmation(trade));
      }
      return trade;
    });
  }

  /** Operator close at `price`. Waits for any in-flight check on the same trade. */
  async close(tradeId: string, price: number, detail = 'Closed by operator'): Promise<Readonly<TradeRecord>> {
    return this.mutex.runExclusive(tradeId, () => this.exit(tradeId, price, 'MANUAL', detail));
  }

  /**
   * One monitoring step for a trade whose lock the caller already holds.
   * No-op unless the trade is MONITORING.
   */
  async check(
    tradeId: string,
    now: Date,
    snapshot: IndicatorSnapshot,
    optionPrice: number,
  ): Promise<CheckOutcome> {
    const trade = this.deps.ledger.get(tradeId);
    if (!trade || trade.status !== 'MONITORING') return { kind: 'inactive' };

    const signal = evaluateExitConditions(
      trade,
      now,
      snapshot,
      optionPrice,
      this.deps.timeZone,
      this.sessionCloseFor(trade),
    );
    if (signal) {
      const exited = await this.exit(tradeId, optionPrice, signal.reason, signal.detail, now);
      return { kind: 'exited', trade: exited };
    }

    const statusDue = this.isStatusDue(trade, now);
    const marked = await this.deps.ledger.recordMark(tradeId, optionPrice, now, statusDue);
    if (statusDue) await this.send(marked, formatStatusUpdate(marked, snapshot));
    return { kind: 'held', trade: marked, statusSent: statusDue };
  }

  /** MONITORING → EXITED. Caller holds the trade's lock. */
  async exit(
    tradeId: string,
    price: number,
    reason: ExitReason,
    detail: string,
    at: Date = this.clock(),
  ): Promise<Readonly<TradeRecord>> {
    const { trade, changed } = await this.deps.ledger.recordExit(tradeId, price, reason, detail, at);
    if (changed) {
      console.log(
        `[LiveTrade ${trade.symbol}] ${trade.id} exited ${reason} @ $${price.toFixed(2)}` +
        ` — P&L $${trade.pnl.toFixed(2)} (${trade.pnlPercent.toFixed(1)}%)`,
      );
      await this.send(trade, formatExitNotification(trade));
    }
    return trade;
  }

  private sessionCloseFor(trade: TradeRecord): Date | null {
    if (!this.deps.sessions || !trade.entryTime) return null;
    const date = exchangeDate(new Date(trade.entryTime), this.deps.timeZone);
    return this.deps.sessions.sessionFor(date)?.close ?? null;
  }

  /** One status message per wall-clock bucket of `statusIntervalMs`. */
  private isStatusDue(trade: TradeRecord, now: Date): boolean {
    if (!trade.lastStatusAt) return true;
    const bucket = (ms: number): number => Math.floor(ms / this.statusIntervalMs);
    return bucket(now.getTime()) !== bucket(Date.parse(trade.lastStatusAt));
  }

  private async send(trade: TradeRecord, text: string): Promise<void> {
    const ok = await this.deps.notifier.notify(text);
    if (!ok) console.warn(`[LiveTrade ${trade.symbol}] Notification failed for ${trade.id}`);
  }
}
