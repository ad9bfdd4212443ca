import { describe, it, expect, beforeEach } from 'vitest';
import { TradeLedger } from '../src/ledger/trade-ledger.js';
import { SetupSweep } from '../src/pipeline/setup-sweep.js';
import {
  FixedPricing,
  MemoryTradeLogStore,
  RecordingNotifier,
  ScriptedMarketData,
  SETUP_AT,
  StaticMarketHours,
  TZ,
  deferred,
  makeSnapshot,
  quietConsole,
} from './helpers.js';

describe('SetupSweep', () => {
  let store: MemoryTradeLogStore;
  let ledger: TradeLedger;
  let notifier: RecordingNotifier;
  let marketData: ScriptedMarketData;
  let hours: StaticMarketHours;
  let pauses: number[];
  let sweep: SetupSweep;

  beforeEach(async () => {
    quietConsole();
    store = new MemoryTradeLogStore();
    ledger = await TradeLedger.open(store, { timeZone: TZ });
    notifier = new RecordingNotifier();
    marketData = new ScriptedMarketData({
      AAPL: makeSnapshot({ relativeVolume: 1.4 }),
      TSLA: makeSnapshot({ symbol: 'TSLA', relativeVolume: 1.0 }),
    });
    hours = new StaticMarketHours(true);
    pauses = [];
    sweep = new SetupSweep({
      ledger,
      notifier,
      marketData,
      pricing: new FixedPricing(),
      marketHours: hours,
      symbols: ['AAPL', 'MSFT', 'TSLA'],
      batchSize: 2,
      batchPauseMs: 250,
      clock: () => SETUP_AT,
      sleep: async ms => { pauses.push(ms); },
    });
  });

  it('records and announces every triggered style, and reports failed symbols', async () => {
    const result = await sweep.run();

    expect(result.skipped).toBeNull();
    expect(result.symbolsScanned).toBe(3);
    expect(result.setups.map(s => s.tradeId)).toEqual(['AAPL_day_20250715_1030', 'AAPL_swing_20250715_1030']);
    expect(result.setups[0]).toEqual({
      tradeId: 'AAPL_day_20250715_1030',
      symbol: 'AAPL',
      style: 'day',
      rule: 'STRONG_BULLISH_CONFLUENCE',
      reason: 'Strong bullish confluence - RVOL: 1.4x, All EMAs bullish',
      confluenceScore: 85,
      notified: true,
    });
    expect(result.errors).toEqual([
      { symbol: 'MSFT', style: null, error: 'Data unavailable for MSFT: no scripted snapshot' },
    ]);
    expect(pauses).toEqual([250]);

    expect(notifier.messages.map(m => m.split('\n')[0])).toEqual([
      '🚨 <b>DAY SETUP DETECTED</b>',
      '🚨 <b>SWING SETUP DETECTED</b>',
    ]);
    expect(ledger.require('AAPL_day_20250715_1030').estimatedEntry).toBe(6);
  });

  it('treats a rerun in the same minute as duplicates', async () => {
    await sweep.run();
    const again = await sweep.run();

    expect(again.setups).toEqual([]);
    expect(again.duplicates).toEqual(['AAPL_day_20250715_1030', 'AAPL_swing_20250715_1030']);
    expect(notifier.messages).toHaveLength(2);
  });

  it('skips while the market is closed unless forced', async () => {
    hours.open = false;
    const skipped = await sweep.run();
    expect(skipped.skipped).toBe('market-closed');
    expect(marketData.calls).toEqual([]);

    const forced = await sweep.run({ force: true });
    expect(forced.skipped).toBeNull();
    expect(marketData.calls).toEqual(['AAPL', 'MSFT', 'TSLA']);
  });

  it('refuses to overlap a running sweep', async () => {
    const gate = deferred();
    marketData.gate = gate.promise;

    const first = sweep.run();
    expect(sweep.isRunning).toBe(true);
    expect((await sweep.run()).skipped).toBe('already-running');

    gate.resolve();
    await first;
    expect(sweep.isRunning).toBe(false);
  });

  it('does not announce a setup that could not be persisted', async () => {
    store.failWith = new Error('disk full');
    const result = await sweep.run();

    expect(result.setups).toEqual([]);
    expect(result.errors).toContainEqual({ symbol: 'AAPL', style: 'day', error: 'Trade log flush failed: disk full' });
    expect(notifier.messages).toEqual([]);
  });

  it('keeps the recorded setup when the alert fails', async () => {
    notifier.result = false;
    const result = await sweep.run();
    expect(result.setups.map(s => s.notified)).toEqual([false, false]);
    expect(ledger.list({ status: 'SETUP_READY' })).toHaveLength(2);
  });
});
