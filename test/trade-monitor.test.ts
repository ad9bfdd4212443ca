import { describe, it, expect, beforeEach } from 'vitest';
import { LiveTradeAgent } from '../src/agents/live-trade-agent.js';
import { TradeMonitor } from '../src/agents/trade-monitor.js';
import { evaluateSetup } from '../src/agents/setup-evaluator.js';
import { TradeLedger } from '../src/ledger/trade-ledger.js';
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
  minutesAfter,
  quietConsole,
} from './helpers.js';

const TRADE_ID = 'AAPL_scalp_20250715_1030';
const NOW = minutesAfter(SETUP_AT, 1);

describe('TradeMonitor', () => {
  let store: MemoryTradeLogStore;
  let ledger: TradeLedger;
  let notifier: RecordingNotifier;
  let agent: LiveTradeAgent;
  let marketData: ScriptedMarketData;
  let pricing: FixedPricing;
  let hours: StaticMarketHours;
  let monitor: TradeMonitor;

  beforeEach(async () => {
    quietConsole();
    store = new MemoryTradeLogStore();
    ledger = await TradeLedger.open(store, { timeZone: TZ });
    notifier = new RecordingNotifier();
    agent = new LiveTradeAgent({ ledger, notifier, timeZone: TZ, clock: () => SETUP_AT });
    marketData = new ScriptedMarketData({ AAPL: makeSnapshot() });
    pricing = new FixedPricing(2.5);
    hours = new StaticMarketHours(true);
    monitor = new TradeMonitor({ ledger, agent, marketData, pricing, marketHours: hours, clock: () => NOW });

    const snapshot = makeSnapshot();
    await ledger.recordSetup({
      symbol: 'AAPL',
      style: 'scalp',
      snapshot,
      decision: evaluateSetup('scalp', snapshot),
      estimatedEntry: 6,
      at: SETUP_AT,
    });
    await agent.enter(TRADE_ID, 2);
    notifier.messages = [];
  });

  it('does nothing while the market is closed', async () => {
    hours.open = false;
    const results = await monitor.tick();
    expect(results.size).toBe(0);
    expect(marketData.calls).toEqual([]);
  });

  it('marks an open trade to market', async () => {
    const results = await monitor.tick();
    const outcome = results.get(TRADE_ID);
    expect(outcome?.kind).toBe('held');
    expect(ledger.require(TRADE_ID).pnl).toBe(0.5);
  });

  it('exits a trade that reaches its target', async () => {
    pricing.price = 3.5;
    const results = await monitor.tick();
    expect(results.get(TRADE_ID)?.kind).toBe('exited');

    const trade = ledger.require(TRADE_ID);
    expect(trade.exitReason).toBe('PROFIT_TARGET');
    expect(trade.exitDetail).toBe('Option $3.50 reached target $3.20');
    expect(ledger.active()).toEqual([]);
  });

  it('leaves the trade untouched when data is unavailable', async () => {
    marketData.snapshots = {};
    const results = await monitor.tick();
    expect(results.get(TRADE_ID)).toEqual({
      kind: 'no-data',
      error: 'Data unavailable for AAPL: no scripted snapshot',
    });
    expect(ledger.require(TRADE_ID).lastMarkTime).toBe(SETUP_AT.toISOString());
  });

  it('reports an unexpected failure without stopping the tick', async () => {
    marketData.snapshots = { AAPL: new Error('socket hang up') };
    const results = await monitor.tick();
    expect(results.get(TRADE_ID)).toEqual({ kind: 'failed', error: 'socket hang up' });
  });

  it('skips a trade whose lock is held', async () => {
    const gate = deferred();
    const held = agent.mutex.runExclusive(TRADE_ID, () => gate.promise);

    const results = await monitor.tick();
    expect(results.get(TRADE_ID)).toEqual({ kind: 'busy' });
    expect(marketData.calls).toEqual([]);

    gate.resolve();
    await held;
  });

  it('exits once when a second tick overlaps an in-flight check', async () => {
    pricing.price = 3.5;
    const gate = deferred();
    marketData.gate = gate.promise;
    const started = marketData.nextCall();

    const first = monitor.tick();
    await started;
    const second = await monitor.tick();
    expect(second.get(TRADE_ID)).toEqual({ kind: 'busy' });
    expect(marketData.calls).toEqual(['AAPL']);

    gate.resolve();
    expect((await first).get(TRADE_ID)?.kind).toBe('exited');
    marketData.gate = null;
    expect((await monitor.tick()).size).toBe(0);

    expect(ledger.require(TRADE_ID).exitReason).toBe('PROFIT_TARGET');
    expect(notifier.messages).toHaveLength(1);
    expect(notifier.messages[0]?.split('\n')[0]).toBe('🟢 <b>EXIT: AAPL SCALP</b>');
  });

  it('skips a trade with an unflushed mutation until the flush lands', async () => {
    store.failWith = new Error('disk full');
    await expect(ledger.recordMark(TRADE_ID, 2.1, SETUP_AT)).rejects.toThrow('Trade log flush failed: disk full');

    const blocked = await monitor.tick();
    expect(blocked.get(TRADE_ID)).toEqual({ kind: 'pending-flush' });
    expect(marketData.calls).toEqual([]);

    store.failWith = null;
    const resumed = await monitor.tick();
    expect(resumed.get(TRADE_ID)?.kind).toBe('held');
  });

  it('stop() waits for an in-flight check and blocks later ticks', async () => {
    const gate = deferred();
    marketData.gate = gate.promise;
    const started = marketData.nextCall();

    const ticking = monitor.tick();
    await started;

    let stopped = false;
    const stopping = monitor.stop().then(() => { stopped = true; });
    await new Promise(resolve => setTimeout(resolve, 0));
    expect(stopped).toBe(false);

    gate.resolve();
    await stopping;
    expect((await ticking).get(TRADE_ID)?.kind).toBe('held');

    marketData.gate = null;
    expect((await monitor.tick()).size).toBe(0);
  });

  it('reports running only between start and stop', async () => {
    expect(monitor.running).toBe(false);
    monitor.start();
    expect(monitor.running).toBe(true);
    await monitor.stop();
    expect(monitor.running).toBe(false);
  });
});
