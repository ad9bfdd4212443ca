/**
 * Setup sweep — one detection pass over the symbol universe.
 *
 * Symbols are scanned concurrently in fixed-size batches with a pause between
 * batches. Each symbol costs one snapshot fetch; every trade style is then
 * evaluated on that snapshot. A triggered setup is persisted first and only
 * then announced, so an alert always refers to a recorded trade.
 */

import { v4 as uuidv4 } from 'uuid';
import { evaluateSetup } from '../agents/setup-evaluator.js';
import { DataUnavailableError, errorMessage } from '../lib/errors.js';
import type { MarketHours } from '../lib/market-calendar.js';
import type { TradeLedger } from '../ledger/trade-ledger.js';
import { formatSetupAlert } from '../telegram/notifier.js';
import type { Notifier } from '../telegram/notifier.js';
import { TRADE_STYLES } from '../types/setup.js';
import type { SetupRule, TradeStyle } from '../types/setup.js';
import type { IndicatorSnapshot } from '../types/snapshot.js';
import type { PricingModel } from './pricing.js';
import type { MarketDataProvider } from './snapshot-builder.js';

export interface SetupSweepDeps {
  ledger: TradeLedger;
  notifier: Notifier;
  marketData: MarketDataProvider;
  pricing: PricingModel;
  marketHours: MarketHours;
  symbols: string[];
  styles?: readonly TradeStyle[];
  batchSize?: number;
  batchPauseMs?: number;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface SweepSetup {
  tradeId: string;
  symbol: string;
  style: TradeStyle;
  rule: SetupRule | null;
  reason: string;
  confluenceScore: number;
  notified: boolean;
}

export interface SweepError {
  symbol: string;
  style: TradeStyle | null;
  error: string;
}

export interface SweepResult {
  runId: string;
  startedAt: string;
  finishedAt: string;
  skipped: 'market-closed' | 'already-running' | null;
  symbolsScanned: number;
  setups: SweepSetup[];
  duplicates: string[];
  errors: SweepError[];
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export class SetupSweep {
  private running = false;
  private readonly styles: readonly TradeStyle[];
  private readonly batchSize: number;
  private readonly batchPauseMs: number;
  private readonly clock: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly deps: SetupSweepDeps) {
    this.styles = deps.styles ?? TRADE_STYLES;
    this.batchSize = Math.max(1, deps.batchSize ?? 5);
    this.batchPauseMs = deps.batchPauseMs ?? 500;
    this.clock = deps.clock ?? (() => new Date());
    this.sleep = deps.sleep ?? defaultSleep;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get symbolCount(): number {
    return this.deps.symbols.length;
  }

  /** Run one sweep. Overlapping calls return immediately as `already-running`. */
  async run(opts: { force?: boolean } = {}): Promise<SweepResult> {
    const startedAt = this.clock();
    const result: SweepResult = {
      runId: uuidv4(),
      startedAt: startedAt.toISOString(),
      finishedAt: startedAt.toISOString(),
      skipped: null,
      symbolsScanned: 0,
      setups: [],
      duplicates: [],
      errors: [],
    };

    if (this.running) {
      console.log('[Sweep] Skipping — previous run still active');
      return { ...result, skipped: 'already-running' };
    }
    if (!opts.force && !this.deps.marketHours.isMarketOpen(startedAt)) {
      console.log('[Sweep] Market closed — skipping');
      return { ...result, skipped: 'market-closed' };
    }

    this.running = true;
    console.log(`[Sweep] Run ${result.runId} — ${this.deps.symbols.length} symbols × ${this.styles.join('/')}`);

    try {
      const { symbols } = this.deps;
      for (let i = 0; i < symbols.length; i += this.batchSize) {
        const batch = symbols.slice(i, i + this.batchSize);
        await Promise.allSettled(batch.map(symbol => this.scanSymbol(symbol, result)));
        result.symbolsScanned += batch.length;

        if (i + this.batchSize < symbols.length) await this.sleep(this.batchPauseMs);
      }
    } finally {
      this.running = false;
    }

    result.finishedAt = this.clock().toISOString();
    console.log(
      `[Sweep] Run ${result.runId} done — ${result.setups.length} setup(s), ` +
      `${result.duplicates.length} duplicate(s), ${result.errors.length} error(s)`,
    );
    return result;
  }

  private async scanSymbol(symbol: string, result: SweepResult): Promise<void> {
    let snapshot: IndicatorSnapshot;
    try {
      snapshot = await this.deps.marketData.getSnapshot(symbol);
    } catch (err) {
      const msg = errorMessage(err);
      if (err instanceof DataUnavailableError) console.warn(`[Sweep] ${symbol}: ${msg}`);
      else console.error(`[Sweep] ${symbol}: snapshot failed: ${msg}`);
      result.errors.push({ symbol, style: null, error: msg });
      return;
    }

    for (const style of this.styles) {
      try {
        await this.evaluateStyle(symbol, style, snapshot, result);
      } catch (err) {
        const msg = errorMessage(err);
        console.error(`[Sweep] ${symbol} ${style}: ${msg}`);
        result.errors.push({ symbol, style, error: msg });
      }
    }
  }

  private async evaluateStyle(
    symbol: string,
    style: TradeStyle,
    snapshot: IndicatorSnapshot,
    result: SweepResult,
  ): Promise<void> {
    const decision = evaluateSetup(style, snapshot);
    if (!decision.triggered) {
      console.log(`[Sweep] ${symbol}: ${decision.reason}`);
      return;
    }

    const { ledger, notifier, pricing } = this.deps;
    const { tradeId, created } = await ledger.recordSetup({
      symbol,
      style,
      snapshot,
      decision,
      estimatedEntry: pricing.estimateEntry(snapshot),
      at: this.clock(),
    });

    if (!created) {
      result.duplicates.push(tradeId);
      return;
    }

    const notified = await notifier.notify(formatSetupAlert(ledger.require(tradeId)));
    if (notified) console.log(`[Sweep] ${style.toUpperCase()} setup alert sent for ${symbol}: ${decision.reason}`);
    else console.warn(`[Sweep] ${style.toUpperCase()} setup alert FAILED for ${symbol} (${tradeId} is recorded)`);

    result.setups.push({
      tradeId,
      symbol,
      style,
      rule: decision.rule,
      reason: decision.reason,
      confluenceScore: decision.confluenceScore,
      notified,
    });
  }
}
