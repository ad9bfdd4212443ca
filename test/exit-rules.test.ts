import { describe, it, expect } from 'vitest';
import { detectTechnicalBreakdown, evaluateExitConditions, timeLimitFor } from '../src/pipeline/exit-rules.js';
import { MarketCalendar } from '../src/lib/market-calendar.js';
import { loadMarketCalendar } from '../src/utils/config-loader.js';
import { SETUP_AT, TZ, makeSnapshot, minutesAfter, monitoringTrade, setupTrade } from './helpers.js';

const setup = makeSnapshot();

describe('detectTechnicalBreakdown', () => {
  it('holds when nothing changed since setup', () => {
    expect(detectTechnicalBreakdown(setup, makeSnapshot())).toBeNull();
  });

  it('flags an EMA cloud that is no longer bullish', () => {
    const current = makeSnapshot({ trendState: { '9_21': 'Neutral', '34_50': 'Bullish' } });
    expect(detectTechnicalBreakdown(setup, current)).toBe('9/21 EMA cloud no longer bullish (now Neutral)');
  });

  it('treats a missing cloud reading as no longer bullish', () => {
    const current = makeSnapshot({ trendState: { '34_50': 'Bullish' } });
    expect(detectTechnicalBreakdown(setup, current)).toBe('9/21 EMA cloud no longer bullish (now N/A)');
  });

  it('ignores clouds that were not bullish at setup', () => {
    const bearishSetup = makeSnapshot({ trendState: { '9_21': 'Bullish', '34_50': 'Bearish' } });
    const current = makeSnapshot({ trendState: { '9_21': 'Bullish', '34_50': 'Bearish' } });
    expect(detectTechnicalBreakdown(bearishSetup, current)).toBeNull();
  });

  it('flags a support lost by more than 0.5%', () => {
    // 21 EMA support 198 → break below 197.01
    const current = makeSnapshot({ price: 196.9 });
    expect(detectTechnicalBreakdown(setup, current)).toBe('Broke 21 EMA support at $198.00 (price $196.90)');
  });

  it('tolerates a dip inside the 0.5% band', () => {
    expect(detectTechnicalBreakdown(setup, makeSnapshot({ price: 197.1 }))).toBeNull();
  });

  it('ignores levels that sat above the setup price', () => {
    const overhead = makeSnapshot({ supportLevels: [{ name: 'Overhead', level: 205 }] });
    expect(detectTechnicalBreakdown(overhead, makeSnapshot({ price: 199 }))).toBeNull();
  });

  it('flags price more than 0.2% under the 50 MA', () => {
    const current = makeSnapshot({ price: 199.5, movingAverages: { '21': 190, '50': 200 } });
    expect(detectTechnicalBreakdown(setup, current)).toBe('Price $199.50 below 50 EMA $200.00');
  });

  it('flags two or more bearish higher timeframes', () => {
    const current = makeSnapshot({ multiTimeframeState: { '1H': 'Bearish', '4H': 'Bearish', '1D': 'Neutral' } });
    expect(detectTechnicalBreakdown(setup, current)).toBe('Multi-timeframe breakdown (1H, 4H bearish)');
  });

  it('tolerates a single bearish timeframe', () => {
    const current = makeSnapshot({ multiTimeframeState: { '1H': 'Bearish', '4H': 'Bullish', '1D': 'Neutral' } });
    expect(detectTechnicalBreakdown(setup, current)).toBeNull();
  });
});

describe('timeLimitFor', () => {
  it('closes scalps at 15:55 exchange time on the entry day (EDT)', () => {
    expect(timeLimitFor('scalp', SETUP_AT, TZ).toISOString()).toBe('2025-07-15T19:55:00.000Z');
  });

  it('closes scalps at 15:55 exchange time on the entry day (EST)', () => {
    expect(timeLimitFor('scalp', new Date('2025-01-15T15:00:00Z'), TZ).toISOString()).toBe('2025-01-15T20:55:00.000Z');
  });

  it('closes scalps five minutes before an early session close', () => {
    const session = new MarketCalendar(loadMarketCalendar()).sessionFor('2025-11-28');
    expect(session?.close.toISOString()).toBe('2025-11-28T18:00:00.000Z');

    const limit = timeLimitFor('scalp', new Date('2025-11-28T15:00:00Z'), TZ, session?.close ?? null);
    expect(limit.toISOString()).toBe('2025-11-28T17:55:00.000Z');
  });

  it('keeps the 15:55 cutoff on a regular session', () => {
    const session = new MarketCalendar(loadMarketCalendar()).sessionFor('2025-07-15');
    const limit = timeLimitFor('scalp', SETUP_AT, TZ, session?.close ?? null);
    expect(limit.toISOString()).toBe('2025-07-15T19:55:00.000Z');
  });

  it('holds day trades two calendar days and swings six weeks', () => {
    expect(timeLimitFor('day', SETUP_AT, TZ).toISOString()).toBe('2025-07-17T14:30:00.000Z');
    expect(timeLimitFor('swing', SETUP_AT, TZ).toISOString()).toBe('2025-08-26T14:30:00.000Z');
  });
});

describe('evaluateExitConditions', () => {
  const trade = monitoringTrade('scalp', 2);  // stop 1.00, target 3.20
  const later = minutesAfter(SETUP_AT, 60);

  it('holds between stop and target', () => {
    expect(evaluateExitConditions(trade, later, makeSnapshot(), 2.5, TZ)).toBeNull();
  });

  it('exits at the profit target', () => {
    expect(evaluateExitConditions(trade, later, makeSnapshot(), 3.2, TZ)).toEqual({
      reason: 'PROFIT_TARGET',
      detail: 'Option $3.20 reached target $3.20',
    });
  });

  it('exits at the stop', () => {
    expect(evaluateExitConditions(trade, later, makeSnapshot(), 1, TZ)).toEqual({
      reason: 'STOP_LOSS',
      detail: 'Option $1.00 hit stop $1.00',
    });
  });

  it('puts technical breakdown ahead of a simultaneous stop breach', () => {
    const current = makeSnapshot({ trendState: { '9_21': 'Bearish', '34_50': 'Bullish' } });
    const signal = evaluateExitConditions(trade, later, current, 0.5, TZ);
    expect(signal?.reason).toBe('TECHNICAL_BREAKDOWN');
  });

  it('puts technical breakdown ahead of a simultaneous profit target', () => {
    const current = makeSnapshot({ trendState: { '9_21': 'Bearish', '34_50': 'Bullish' } });
    expect(evaluateExitConditions(trade, later, current, 3.5, TZ)).toEqual({
      reason: 'TECHNICAL_BREAKDOWN',
      detail: '9/21 EMA cloud no longer bullish (now Bearish)',
    });
  });

  it('puts the profit target ahead of the time limit', () => {
    const cutoff = new Date('2025-07-15T19:55:00Z');
    expect(evaluateExitConditions(trade, cutoff, makeSnapshot(), 3.5, TZ)?.reason).toBe('PROFIT_TARGET');
  });

  it('puts the time limit ahead of the stop', () => {
    const cutoff = new Date('2025-07-15T19:55:00Z');
    expect(evaluateExitConditions(trade, cutoff, makeSnapshot(), 0.9, TZ)).toEqual({
      reason: 'TIME_LIMIT',
      detail: 'Scalp time limit reached (15:55 exchange time)',
    });
  });

  it('treats the time-limit boundary as inclusive', () => {
    expect(evaluateExitConditions(trade, new Date('2025-07-15T19:54:59Z'), makeSnapshot(), 2, TZ)).toBeNull();
    expect(evaluateExitConditions(trade, new Date('2025-07-15T19:55:00Z'), makeSnapshot(), 2, TZ)?.reason).toBe('TIME_LIMIT');
  });

  it('expires a scalp before an early close', () => {
    const entered = new Date('2025-11-28T15:00:00Z');
    const scalp = monitoringTrade('scalp', 2, entered);
    const close = new Date('2025-11-28T18:00:00Z');

    expect(evaluateExitConditions(scalp, new Date('2025-11-28T17:54:59Z'), makeSnapshot(), 2, TZ, close)).toBeNull();
    expect(evaluateExitConditions(scalp, new Date('2025-11-28T17:55:00Z'), makeSnapshot(), 2, TZ, close)).toEqual({
      reason: 'TIME_LIMIT',
      detail: 'Scalp time limit reached (12:55 exchange time)',
    });
  });

  it('expires day trades after two days', () => {
    const day = monitoringTrade('day', 2);
    expect(evaluateExitConditions(day, minutesAfter(SETUP_AT, 48 * 60), makeSnapshot(), 2, TZ)).toEqual({
      reason: 'TIME_LIMIT',
      detail: 'Day trade time limit reached (2 days)',
    });
  });

  it('never exits a trade that is not being monitored', () => {
    expect(evaluateExitConditions(setupTrade('scalp'), later, makeSnapshot(), 0.1, TZ)).toBeNull();
  });
});
