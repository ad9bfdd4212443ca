/**
 * TradeMonitor — fixed-interval loop over every MONITORING trade.
 *
 * Per tick:
 *   1. Retry any unflushed ledger writes
 *   2. Skip everything while the market is closed
 *   3. For each active trade: skip if its lock is held or it still has an
 *      unflushed mutation; otherwise fetch a snapshot, price the option and
 *      run LiveTradeAgent.check() under the lock
 *
 * Trades are checked concurrently and independently; a failure on one never
 * affects another or stops the loop.
 */

import { DataUnavailableError, errorMessage } from '../lib/errors.js';
import type { MarketHours } from '../lib/market-calendar.js';
import type { TradeLedger } from '../ledger/trade-ledger.js';
import type { MarketDataProvider } from '../pipeline/snapshot-builder.js';
import type { PricingModel } from '../pipeline/pricing.js';
import type { IndicatorSnapshot } from '../types/snapshot.js';
import type { CheckOutcome, LiveTradeAgent } from './live-trade-agent.js';

export const DEFAULT_MONITOR_INTERVAL_MS = 30_000;

export interface TradeMonitorDeps {
  ledger: TradeLedger;
  agent: LiveTradeAgent;
  marketData: MarketDataProvider;
  pricing: PricingModel;
  marketHours: MarketHours;
  intervalMs?: number;
  clock?: () => Date;
}

export type TradeCheckResult =
  | CheckOutcome
  | { kind: 'busy' }
  | { kind: 'pending-flush' }
  | { kind: 'no-data'; error: string }
  | { kind: 'failed'; error: string };

export class TradeMonitor {
  private timer: NodeJS.Timeout | null = null;
  private readonly inFlight = new Set<Promise<unknown>>();
  private readonly intervalMs: number;
  private readonly clock: () => Date;
  private stopping = false;

  constructor(private readonly deps: TradeMonitorDeps) {
    this.intervalMs = deps.intervalMs ?? DEFAULT_MONITOR_INTERVAL_MS;
    this.clock = deps.clock ?? (() => new Date());
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.stopping = false;
    this.timer = setInterval(() => {
      this.tick().catch(err => console.error('[Monitor] Tick error:', errorMessage(err)));
    }, this.intervalMs);
    console.log(`[Monitor] Started — every ${this.intervalMs / 1000}s`);
  }

  /** No new ticks; resolves once every in-flight check has finished. */
  async stop(): Promise<void> {
    this.stopping = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await Promise.allSettled([...this.inFlight]);
    console.log('[Monitor] Stopped');
  }

  async tick(): Promise<Map<string, TradeCheckResult>> {
    const results = new Map<string, TradeCheckResult>();

    await this.deps.ledger.flushPending();

    const now = this.clock();
    if (this.stopping || !this.deps.marketHours.isMarketOpen(now)) return results;

    const active = this.deps.ledger.active();
    await Promise.all(
      active.map(async trade => {
        results.set(trade.id, await this.track(this.checkTrade(trade.id, now)));
      }),
    );
    return results;
  }

  /** One guarded check of a single trade. Never rejects. */
  async checkTrade(tradeId: string, now: Date = this.clock()): Promise<TradeCheckResult> {
    if (this.deps.ledger.hasPendingFlush(tradeId)) return { kind: 'pending-flush' };

    try {
      const attempt = await this.deps.agent.mutex.tryRunExclusive(tradeId, async () => {
        const trade = this.deps.ledger.get(tradeId);
        if (!trade || trade.status !== 'MONITORING') return { kind: 'inactive' } as const;

        let snapshot: IndicatorSnapshot;
        try {
          snapshot = await this.deps.marketData.getSnapshot(trade.symbol);
        } catch (err) {
          if (!(err instanceof DataUnavailableError)) throw err;
          console.warn(`[Monitor] ${trade.symbol} ${trade.style} ${trade.id}: ${err.message} — retry next tick`);
          return { kind: 'no-data', error: err.message } as const;
        }

        const optionPrice = this.deps.pricing.markPrice(trade, snapshot);
        return this.deps.agent.check(tradeId, now, snapshot, optionPrice);
      });

      return attempt.ran ? attempt.value : { kind: 'busy' };
    } catch (err) {
      const msg = errorMessage(err);
      console.error(`[Monitor] Check failed for ${tradeId}: ${msg}`);
      return { kind: 'failed', error: msg };
    }
  }

  private async track<T>(work: Promise<T>): Promise<T> {
    this.inFlight.add(work);
    try {
      return await work;
    } finally {
      this.inFlight.delete(work);
    }
  }
}
