/**
 * alpaca-api.ts — Alpaca market-data REST client. Every bar request in the
 * service goes through here.
 */

import { DataUnavailableError } from './errors.js';
import { TIMEFRAME_REQUEST, alpacaBarsResponseSchema, normalizeAlpacaBars } from '../types/market.js';
import type { OHLCVBar, Timeframe } from '../types/market.js';

const BARS_PAGE_LIMIT = 10_000;
const MAX_PAGES = 5;

export interface AlpacaDataOptions {
  apiKey: string;
  secretKey: string;
  dataUrl: string;
  feed: string;        // 'iex' | 'sip'
  timeoutMs: number;
}

export class AlpacaDataClient {
  constructor(private readonly opts: AlpacaDataOptions) {}

  private authHeaders(): Record<string, string> {
    return {
      'APCA-API-KEY-ID': this.opts.apiKey,
      'APCA-API-SECRET-KEY': this.opts.secretKey,
    };
  }

  /** Bars for `symbol` covering the timeframe's lookback window ending at `now`. */
  async fetchBars(symbol: string, timeframe: Timeframe, now = new Date()): Promise<OHLCVBar[]> {
    const { alpaca, lookbackDays } = TIMEFRAME_REQUEST[timeframe];
    const start = new Date(now.getTime() - lookbackDays * 24 * 60 * 60 * 1000);

    const bars: OHLCVBar[] = [];
    let pageToken: string | null | undefined;

    for (let page = 0; page < MAX_PAGES; page++) {
      const url = new URL(`${this.opts.dataUrl}/v2/stocks/${encodeURIComponent(symbol)}/bars`);
      url.searchParams.set('timeframe', alpaca);
      url.searchParams.set('start', start.toISOString());
      url.searchParams.set('limit', String(BARS_PAGE_LIMIT));
      url.searchParams.set('adjustment', 'raw');
      url.searchParams.set('feed', this.opts.feed);
      if (pageToken) url.searchParams.set('page_token', pageToken);

      const res = await fetch(url.toString(), {
        headers: this.authHeaders(),
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });
      if (!res.ok) {
        throw new DataUnavailableError(symbol, `Alpaca bars error ${res.status} (${timeframe})`);
      }

      const parsed = alpacaBarsResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new DataUnavailableError(symbol, `malformed ${timeframe} bars response`, { cause: parsed.error });
      }

      bars.push(...normalizeAlpacaBars(parsed.data));
      pageToken = parsed.data.next_page_token;
      if (!pageToken) break;
    }

    return bars;
  }
}
