import { vi } from 'vitest';
import { DataUnavailableError } from '../src/lib/errors.js';
import type { MarketHours } from '../src/lib/market-calendar.js';
import { emptyTradeLog } from '../src/db/trade-log.js';
import type { LoadResult, TradeLogData, TradeLogStore } from '../src/db/trade-log.js';
import { applyEntry, createSetupRecord } from '../src/pipeline/trade-lifecycle.js';
import type { PricingModel } from '../src/pipeline/pricing.js';
import type { MarketDataProvider } from '../src/pipeline/snapshot-builder.js';
import type { Notifier } from '../src/telegram/notifier.js';
import { evaluateSetup } from '../src/agents/setup-evaluator.js';
import type { TradeStyle } from '../src/types/setup.js';
import { createIndicatorSnapshot } from '../src/types/snapshot.js';
import type { IndicatorSnapshot, IndicatorSnapshotInput } from '../src/types/snapshot.js';
import type { TradeRecord } from '../src/types/trade.js';

export const TZ = 'America/New_York';

/** Tuesday 2025-07-15 10:30 EDT */
export const SETUP_AT = new Date('2025-07-15T14:30:00.000Z');

const BASE_SNAPSHOT: IndicatorSnapshotInput = {
  symbol: 'AAPL',
  timestamp: SETUP_AT.toISOString(),
  price: 200,
  movingAverages: { '9': 199.5, '21': 198, '34': 197, '50': 196, '200': 190 },
  trendState: { '9_21': 'Bullish', '34_50': 'Bullish' },
  multiTimeframeState: { '1H': 'Bullish', '4H': 'Bullish', '1D': 'Neutral' },
  relativeVolume: 1.6,
  pivots: { s1: 195, r1: 202, pdl: 194, pdh: 201, pml: 197, pmh: 200.5 },
  supportLevels: [
    { name: 'S1 Pivot', level: 195 },
    { name: '21 EMA', level: 198 },
    { name: 'PDL', level: 194 },
  ],
  atr: 3,
  impliedVolatility: 0.24,
  delta: 0.5,
};

export function makeSnapshot(overrides: Partial<IndicatorSnapshotInput> = {}): IndicatorSnapshot {
  return createIndicatorSnapshot({ ...BASE_SNAPSHOT, ...overrides });
}

export function setupTrade(style: TradeStyle = 'scalp', snapshot = makeSnapshot(), at = SETUP_AT): TradeRecord {
  return createSetupRecord({
    id: `${snapshot.symbol}_${style}_test`,
    symbol: snapshot.symbol,
    style,
    snapshot,
    decision: evaluateSetup(style, snapshot),
    estimatedEntry: 6,
    at,
  });
}

export function monitoringTrade(style: TradeStyle = 'scalp', fill = 2, at = SETUP_AT): TradeRecord {
  return applyEntry(setupTrade(style, makeSnapshot(), at), fill, at, { stopLossFraction: 0.5 });
}

export const minutesAfter = (date: Date, minutes: number): Date =>
  new Date(date.getTime() + minutes * 60_000);

// ── Fakes ─────────────────────────────────────────────────────────────────────

export class MemoryTradeLogStore implements TradeLogStore {
  saved: TradeLogData[] = [];
  failWith: Error | null = null;

  constructor(private readonly initial: LoadResult = { data: emptyTradeLog(), skipped: [] }) {}

  async load(): Promise<LoadResult> {
    return structuredClone(this.initial);
  }

  async save(data: TradeLogData): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.saved.push(structuredClone(data));
  }

  get last(): TradeLogData | undefined {
    return this.saved[this.saved.length - 1];
  }
}

export class RecordingNotifier implements Notifier {
  messages: string[] = [];
  result = true;

  async notify(text: string): Promise<boolean> {
    this.messages.push(text);
    return this.result;
  }
}

export class StaticMarketHours implements MarketHours {
  constructor(public open = true) {}

  isMarketOpen(): boolean {
    return this.open;
  }
}

export class FixedPricing implements PricingModel {
  constructor(public price = 2, public entry = 6) {}

  estimateEntry(): number {
    return this.entry;
  }

  markPrice(): number {
    return this.price;
  }
}

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function deferred(): Deferred {
  let resolve: () => void = () => {};
  const promise = new Promise<void>(r => { resolve = r; });
  return { promise, resolve };
}

/** Market data keyed by symbol; an Error entry rejects, a gate holds the call open. */
export class ScriptedMarketData implements MarketDataProvider {
  calls: string[] = [];
  gate: Promise<void> | null = null;
  private readonly started: Deferred[] = [];

  constructor(public snapshots: Record<string, IndicatorSnapshot | Error> = {}) {}

  /** Resolves once the next getSnapshot call has begun. */
  nextCall(): Promise<void> {
    const d = deferred();
    this.started.push(d);
    return d.promise;
  }

  async getSnapshot(symbol: string): Promise<IndicatorSnapshot> {
    this.calls.push(symbol);
    this.started.shift()?.resolve();
    if (this.gate) await this.gate;

    const entry = this.snapshots[symbol];
    if (entry instanceof Error) throw entry;
    if (!entry) throw new DataUnavailableError(symbol, 'no scripted snapshot');
    return entry;
  }
}

/** Silence console noise from the code under test. */
export function quietConsole(): void {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
}
