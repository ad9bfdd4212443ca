/**
 * TradeLedger — owns every tracked trade and the daily statistics.
 *
 * All mutation goes through the record* methods, which apply a pure
 * transition, then flush the full log before returning. Flushes run one at a
 * time. When a flush fails the in-memory state stays ahead of disk, the
 * touched trades are marked pending, and the mutation rejects with
 * PersistenceError; flushPending() retries. Repeating an entry or exit whose
 * flush failed flushes again and, once it lands, reports the transition as
 * changed so the caller can announce it.
 */

import { PersistenceError, TradeNotFoundError, errorMessage } from '../lib/errors.js';
import type { TradeLogData, TradeLogStore } from '../db/trade-log.js';
import {
  applyEntry,
  applyExit,
  applyMark,
  createSetupRecord,
  isDuplicateEntry,
  isDuplicateExit,
  tradeIdFor,
} from '../pipeline/trade-lifecycle.js';
import type { SetupDecision, TradeStyle } from '../types/setup.js';
import type { IndicatorSnapshot } from '../types/snapshot.js';
import type { DailyStats, PerformanceSummary } from '../types/stats.js';
import { DEFAULT_RISK_PARAMS } from '../types/trade.js';
import type { ExitReason, RiskParams, TradeRecord, TradeStatus } from '../types/trade.js';
import { addToDailyStats, reportedDailyStats, summarize, tradeDate } from './performance.js';

export interface TradeLedgerOptions {
  timeZone: string;
  risk?: RiskParams;
}

export interface SetupInput {
  symbol: string;
  style: TradeStyle;
  snapshot: IndicatorSnapshot;
  decision: SetupDecision;
  estimatedEntry: number;
  at: Date;
}

export interface TransitionResult {
  trade: Readonly<TradeRecord>;
  changed: boolean;
}

export interface LedgerHealth {
  ok: boolean;
  pendingFlushes: string[];
  lastFlushError: string | null;
  lastFlushAt: string | null;
}

export class TradeLedger {
  private readonly trades = new Map<string, Readonly<TradeRecord>>();
  private dailyStats: Record<string, DailyStats> = {};
  private unreadable: unknown[] = [];

  private readonly pending = new Set<string>();
  /** `entry:<id>` / `exit:<id>` transitions whose caller saw a failed flush. */
  private readonly unannounced = new Set<string>();
  private flushChain: Promise<void> = Promise.resolve();
  private lastFlushError: string | null = null;
  private lastFlushAt: string | null = null;

  private readonly timeZone: string;
  private readonly risk: RiskParams;

  private constructor(private readonly store: TradeLogStore, opts: TradeLedgerOptions) {
    this.timeZone = opts.timeZone;
    this.risk = opts.risk ?? DEFAULT_RISK_PARAMS;
  }

  /** Load the log from `store`. Rejects with PersistenceError if the file is unreadable. */
  static async open(store: TradeLogStore, opts: TradeLedgerOptions): Promise<TradeLedger> {
    const ledger = new TradeLedger(store, opts);
    const { data, skipped } = await store.load();

    for (const s of skipped) {
      console.warn(`[Ledger] Skipping unreadable trade #${s.index}${s.id ? ` (${s.id})` : ''}: ${s.error}`);
    }
    for (const trade of data.trades) {
      ledger.trades.set(trade.id, Object.freeze(trade));
    }
    ledger.dailyStats = data.dailyStats;
    ledger.unreadable = data.unreadable;
    ledger.lastFlushAt = data.lastUpdated;

    console.log(`[Ledger] Loaded ${ledger.trades.size} trade(s), ${ledger.active().length} monitoring`);
    return ledger;
  }

  // ── Reads ────────────────────────────────────────────────────────────────

  get(id: string): Readonly<TradeRecord> | undefined {
    return this.trades.get(id);
  }

  require(id: string): Readonly<TradeRecord> {
    const trade = this.trades.get(id);
    if (!trade) throw new TradeNotFoundError(id);
    return trade;
  }

  /** Trades in setup order, optionally filtered by status. */
  list(filter: { status?: TradeStatus } = {}): Readonly<TradeRecord>[] {
    return [...this.trades.values()]
      .filter(t => !filter.status || t.status === filter.status)
      .sort((a, b) => a.setupTime.localeCompare(b.setupTime));
  }

  active(): Readonly<TradeRecord>[] {
    return this.list({ status: 'MONITORING' });
  }

  getDailyStats(): Readonly<Record<string, DailyStats>> {
    return Object.fromEntries(
      Object.entries(this.dailyStats).map(([date, bucket]) => [date, reportedDailyStats(bucket)]),
    );
  }

  summary(days: number, now: Date): PerformanceSummary {
    return summarize([...this.trades.values()], days, now, this.timeZone);
  }

  hasPendingFlush(id: string): boolean {
    return this.pending.has(id);
  }

  health(): LedgerHealth {
    return {
      ok: this.pending.size === 0,
      pendingFlushes: [...this.pending],
      lastFlushError: this.lastFlushError,
      lastFlushAt: this.lastFlushAt,
    };
  }

  // ── Mutations ────────────────────────────────────────────────────────────

  /**
   * Record a triggered setup as SETUP_READY. A second setup for the same
   * symbol and style within the same exchange minute returns the existing id.
   */
  async recordSetup(input: SetupInput): Promise<{ tradeId: string; created: boolean }> {
    const id = tradeIdFor(input.symbol, input.style, input.at, this.timeZone);
    if (this.trades.has(id)) return { tradeId: id, created: false };

    this.put(createSetupRecord({ id, ...input }));
    await this.commit(id);
    return { tradeId: id, created: true };
  }

  async recordEntry(id: string, fill: number, at: Date): Promise<TransitionResult> {
    const trade = this.require(id);
    if (isDuplicateEntry(trade, fill)) return this.settleRepeat(`entry:${id}`, trade);

    const next = this.put(applyEntry(trade, fill, at, this.risk));
    await this.commitTransition(`entry:${id}`, id);
    return { trade: next, changed: true };
  }

  async recordMark(id: string, price: number, at: Date, statusSent = false): Promise<Readonly<TradeRecord>> {
    const next = this.put(applyMark(this.require(id), price, at, statusSent));
    await this.commit(id);
    return next;
  }

  async recordExit(
    id: string,
    price: number,
    reason: ExitReason,
    detail: string,
    at: Date,
  ): Promise<TransitionResult> {
    const trade = this.require(id);
    if (isDuplicateExit(trade, price, reason)) return this.settleRepeat(`exit:${id}`, trade);

    const next = this.put(applyExit(trade, price, reason, detail, at));
    const date = tradeDate(next, this.timeZone);
    this.dailyStats = { ...this.dailyStats, [date]: addToDailyStats(this.dailyStats[date], next) };

    await this.commitTransition(`exit:${id}`, id);
    return { trade: next, changed: true };
  }

  /** Retry outstanding flushes. Resolves true once disk matches memory. */
  async flushPending(): Promise<boolean> {
    if (this.pending.size === 0) return true;
    try {
      await this.commit();
      return true;
    } catch (err) {
      console.error(`[Ledger] Flush retry failed: ${errorMessage(err)}`);
      return false;
    }
  }

  // ── Internals ────────────────────────────────────────────────────────────

  private put(trade: TradeRecord): Readonly<TradeRecord> {
    const frozen = Object.freeze(trade);
    this.trades.set(trade.id, frozen);
    return frozen;
  }

  private async commitTransition(key: string, id: string): Promise<void> {
    try {
      await this.commit(id);
    } catch (err) {
      this.unannounced.add(key);
      throw err;
    }
  }

  /** A repeated entry/exit: unchanged, unless its first flush failed. */
  private async settleRepeat(key: string, trade: Readonly<TradeRecord>): Promise<TransitionResult> {
    if (!this.unannounced.has(key)) return { trade, changed: false };
    if (this.pending.has(trade.id)) await this.commit(trade.id);
    this.unannounced.delete(key);
    return { trade, changed: true };
  }

  private async commit(id?: string): Promise<void> {
    if (id) this.pending.add(id);

    const run = this.flushChain.then(() => this.flush());
    this.flushChain = run.catch(() => undefined);
    await run;
  }

  /** Write the current state; clears only the ids that were pending when it started. */
  private async flush(): Promise<void> {
    const covered = [...this.pending];
    const lastUpdated = new Date().toISOString();
    const data: TradeLogData = {
      trades: this.list(),
      dailyStats: this.dailyStats,
      lastUpdated,
      unreadable: this.unreadable,
    };

    try {
      await this.store.save(data);
    } catch (err) {
      this.lastFlushError = errorMessage(err);
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError(`Trade log flush failed: ${this.lastFlushError}`, { cause: err });
    }

    for (const id of covered) this.pending.delete(id);
    this.lastFlushError = null;
    this.lastFlushAt = lastUpdated;
  }
}
