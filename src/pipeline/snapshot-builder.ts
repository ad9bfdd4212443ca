/**
 * Snapshot builder — turns raw Alpaca bars into an IndicatorSnapshot.
 *
 *   5m bars  → moving averages, EMA clouds, RVOL, premarket range, price
 *   1h bars  → 1H and 4H (aggregated) trend buckets
 *   1d bars  → 1D trend bucket, previous-day pivots, ATR, swing range
 */

import { computeATR } from '../indicators/atr.js';
import { computeEMAs } from '../indicators/moving-average.js';
import { computeClassicPivots, rangeOf } from '../indicators/pivots.js';
import { computeRelativeVolume } from '../indicators/relative-volume.js';
import { classifyCloud, trendFromCloses } from '../indicators/trend.js';
import { DataUnavailableError, errorMessage } from '../lib/errors.js';
import { exchangeClock, exchangeDate } from '../lib/exchange-time.js';
import { withTimeout } from '../lib/timeout.js';
import type { AlpacaDataClient } from '../lib/alpaca-api.js';
import type { BarSet, OHLCVBar } from '../types/market.js';
import { MA_PERIODS, createIndicatorSnapshot } from '../types/snapshot.js';
import type { IndicatorSnapshot, TrendState } from '../types/snapshot.js';

const TRADING_DAYS_PER_YEAR = 252;
const SESSION_OPEN = '09:30';
const SESSION_CLOSE = '16:00';

/** Market-data collaborator. Rejects with DataUnavailableError when no snapshot can be built. */
export interface MarketDataProvider {
  getSnapshot(symbol: string): Promise<IndicatorSnapshot>;
}

// ── Bar helpers ────────────────────────────────────────────────────────────

/** Group bars by exchange-local date, oldest first. */
export function groupBySession(bars: OHLCVBar[], timeZone: string): Map<string, OHLCVBar[]> {
  const sessions = new Map<string, OHLCVBar[]>();
  for (const bar of bars) {
    const date = exchangeDate(new Date(bar.timestamp), timeZone);
    const list = sessions.get(date);
    if (list) list.push(bar);
    else sessions.set(date, [bar]);
  }
  return sessions;
}

/** Merge consecutive bars of the same session into groups of `size`. */
export function aggregateBars(bars: OHLCVBar[], size: number, timeZone: string): OHLCVBar[] {
  const out: OHLCVBar[] = [];
  for (const session of groupBySession(bars, timeZone).values()) {
    for (let i = 0; i < session.length; i += size) {
      const chunk = session.slice(i, i + size);
      const first = chunk[0];
      const last = chunk[chunk.length - 1];
      const range = rangeOf(chunk);
      if (!first || !last || !range) continue;
      out.push({
        timestamp: first.timestamp,
        open: first.open,
        high: range.high,
        low: range.low,
        close: last.close,
        volume: chunk.reduce((acc, b) => acc + b.volume, 0),
      });
    }
  }
  return out;
}

function isRegularSession(bar: OHLCVBar, timeZone: string): boolean {
  const clock = exchangeClock(new Date(bar.timestamp), timeZone);
  return clock >= SESSION_OPEN && clock < SESSION_CLOSE;
}

function isPremarket(bar: OHLCVBar, timeZone: string): boolean {
  return exchangeClock(new Date(bar.timestamp), timeZone) < SESSION_OPEN;
}

const closes = (bars: OHLCVBar[]): number[] => bars.map(b => b.close);

// ── Pure builder ───────────────────────────────────────────────────────────

export function buildSnapshot(
  symbol: string,
  bars: BarSet,
  now: Date,
  timeZone: string,
): IndicatorSnapshot {
  const lastIntraday = bars.intraday[bars.intraday.length - 1];
  if (!lastIntraday) throw new DataUnavailableError(symbol, 'no intraday bars');

  const today = exchangeDate(new Date(lastIntraday.timestamp), timeZone);
  const price = lastIntraday.close;

  const movingAverages = computeEMAs(closes(bars.intraday), MA_PERIODS);
  const ma = (p: number): number | undefined => movingAverages[String(p)];

  const ma21 = ma(21);
  const ma50 = ma(50);
  if (ma21 === undefined || ma50 === undefined) {
    throw new DataUnavailableError(symbol, `only ${bars.intraday.length} intraday bars; need 50 for MA50`);
  }

  const trendState: Record<string, TrendState> = {};
  const ma9 = ma(9);
  const ma34 = ma(34);
  if (ma9 !== undefined) trendState['9_21'] = classifyCloud(ma9, ma21);
  if (ma34 !== undefined) trendState['34_50'] = classifyCloud(ma34, ma50);

  const multiTimeframeState: Record<string, TrendState> = {
    '1H': trendFromCloses(closes(bars.hourly)),
    '4H': trendFromCloses(closes(aggregateBars(bars.hourly, 4, timeZone))),
    '1D': trendFromCloses(closes(bars.daily)),
  };

  // Previous completed session from the daily series
  const priorDays = bars.daily.filter(b => exchangeDate(new Date(b.timestamp), timeZone) < today);
  const prevDay = priorDays[priorDays.length - 1];
  if (!prevDay) throw new DataUnavailableError(symbol, 'no previous daily bar');

  const { r1, s1 } = computeClassicPivots(prevDay);
  const pdh = prevDay.high;
  const pdl = prevDay.low;

  const sessions = groupBySession(bars.intraday, timeZone);
  const premarket = rangeOf((sessions.get(today) ?? []).filter(b => isPremarket(b, timeZone)));

  const regularSessions = [...sessions.values()]
    .map(s => s.filter(b => isRegularSession(b, timeZone)))
    .filter(s => s.length > 0);
  const relativeVolume = computeRelativeVolume(regularSessions);

  const { atr, atrPct } = computeATR(bars.daily);
  const swing = rangeOf(bars.daily);

  return createIndicatorSnapshot({
    symbol,
    timestamp: now.toISOString(),
    price,
    movingAverages,
    trendState,
    multiTimeframeState,
    relativeVolume,
    pivots: {
      s1,
      r1,
      pdl,
      pdh,
      pml: premarket?.low ?? pdl,
      pmh: premarket?.high ?? pdh,
    },
    supportLevels: [
      { name: 'S1 Pivot', level: s1 },
      { name: '21 EMA', level: ma21 },
      { name: 'PDL', level: pdl },
    ].filter(s => s.level > 0),
    atr,
    impliedVolatility: (atrPct / 100) * Math.sqrt(TRADING_DAYS_PER_YEAR),
    delta: 0.5,
    swingHigh: swing?.high ?? null,
    swingLow: swing?.low ?? null,
  });
}

// ── Alpaca-backed provider ─────────────────────────────────────────────────

export class AlpacaSnapshotProvider implements MarketDataProvider {
  constructor(
    private readonly client: AlpacaDataClient,
    private readonly timeZone: string,
    private readonly timeoutMs: number,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async getSnapshot(symbol: string): Promise<IndicatorSnapshot> {
    const now = this.clock();
    try {
      // Fetch all 3 timeframes in parallel
      const [intraday, hourly, daily] = await withTimeout(
        Promise.all([
          this.client.fetchBars(symbol, '5m', now),
          this.client.fetchBars(symbol, '1h', now),
          this.client.fetchBars(symbol, '1d', now),
        ]),
        this.timeoutMs,
        () => new DataUnavailableError(symbol, `market data timed out after ${this.timeoutMs}ms`),
      );
      return buildSnapshot(symbol, { intraday, hourly, daily }, now, this.timeZone);
    } catch (err) {
      if (err instanceof DataUnavailableError) throw err;
      throw new DataUnavailableError(symbol, errorMessage(err), { cause: err });
    }
  }
}
