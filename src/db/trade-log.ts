/**
 * Trade-log persistence. The whole log is one JSON document:
 *
 *   { "trades": [...], "dailyStats": { "YYYY-MM-DD": {...} }, "lastUpdated": "..." }
 *
 * Writes replace the file atomically (temp file + fsync + rename).
 */

import { open, readFile, rename, mkdir } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { PersistenceError, errorMessage } from '../lib/errors.js';
import { dailyStatsSchema } from '../types/stats.js';
import type { DailyStats } from '../types/stats.js';
import { tradeRecordSchema } from '../types/trade.js';
import type { TradeRecord } from '../types/trade.js';

export interface TradeLogData {
  trades: TradeRecord[];
  dailyStats: Record<string, DailyStats>;
  lastUpdated: string | null;
  /** Raw entries that failed validation on load; written back untouched. */
  unreadable: unknown[];
}

export interface SkippedRecord {
  index: number;
  id: string | null;
  error: string;
}

export interface LoadResult {
  data: TradeLogData;
  skipped: SkippedRecord[];
}

export interface TradeLogStore {
  load(): Promise<LoadResult>;
  save(data: TradeLogData): Promise<void>;
}

const logFileSchema = z.object({
  trades:      z.array(z.unknown()).default([]),
  dailyStats:  z.record(z.string(), z.unknown()).default({}),
  lastUpdated: z.string().nullable().default(null),
});

export function emptyTradeLog(): TradeLogData {
  return { trades: [], dailyStats: {}, lastUpdated: null, unreadable: [] };
}

function idOf(raw: unknown): string | null {
  const parsed = z.object({ id: z.string() }).safeParse(raw);
  return parsed.success ? parsed.data.id : null;
}

/** Validate a parsed log document record by record. */
export function parseTradeLog(raw: unknown): LoadResult {
  const file = logFileSchema.safeParse(raw);
  if (!file.success) {
    throw new PersistenceError(`Trade log has an unexpected shape: ${file.error.issues[0]?.message ?? 'invalid'}`);
  }

  const data = emptyTradeLog();
  data.lastUpdated = file.data.lastUpdated;
  const skipped: SkippedRecord[] = [];

  file.data.trades.forEach((entry, index) => {
    const trade = tradeRecordSchema.safeParse(entry);
    if (trade.success) {
      data.trades.push(trade.data);
    } else {
      data.unreadable.push(entry);
      skipped.push({ index, id: idOf(entry), error: trade.error.issues[0]?.message ?? 'invalid record' });
    }
  });

  for (const [date, bucket] of Object.entries(file.data.dailyStats)) {
    const stats = dailyStatsSchema.safeParse(bucket);
    if (stats.success) data.dailyStats[date] = stats.data;
  }

  return { data, skipped };
}

export function serializeTradeLog(data: TradeLogData): string {
  return JSON.stringify(
    {
      trades: [...data.trades, ...data.unreadable],
      dailyStats: data.dailyStats,
      lastUpdated: data.lastUpdated,
    },
    null,
    2,
  );
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class JsonFileTradeLogStore implements TradeLogStore {
  constructor(readonly path: string) {}

  async load(): Promise<LoadResult> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return { data: emptyTradeLog(), skipped: [] };
      throw new PersistenceError(`Cannot read trade log ${this.path}: ${errorMessage(err)}`, { cause: err });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new PersistenceError(`Trade log ${this.path} is not valid JSON: ${errorMessage(err)}`, { cause: err });
    }
    return parseTradeLog(raw);
  }

  async save(data: TradeLogData): Promise<void> {
    const tmp = `${this.path}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      const handle = await open(tmp, 'w');
      try {
        await handle.writeFile(serializeTradeLog(data), 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmp, this.path);
    } catch (err) {
      throw new PersistenceError(`Cannot write trade log ${this.path}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
